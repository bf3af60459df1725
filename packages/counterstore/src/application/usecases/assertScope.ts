export function assertScope(scope: string) {
  if (typeof scope !== "string" || scope.length === 0) {
    throw new TypeError("Counter scope must be a non-empty string");
  }
}
