/** In-memory image of the persisted counters plus the values changed since the last flush. */
export class LevelDbCounterMap extends Map<string, number> {
  readonly pending = new Map<string, number>();

  bump(scope: string): number {
    const next = (this.get(scope) ?? 0) + 1;
    this.mark(scope, next);
    return next;
  }

  mark(scope: string, value: number) {
    this.set(scope, value);
    this.pending.set(scope, value);
  }
}
