export class NotFoundError extends Error {
  readonly code = "NOT_FOUND";

  constructor(readonly resource: "application" | "chat" | "message", id: string) {
    super(`The ${resource} ${id} does not exist`);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  readonly code = "INVALID_INPUT";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}

export class DuplicateTokenError extends Error {
  readonly code = "DUPLICATE_TOKEN";

  constructor() {
    super("The application token is already in use");
    this.name = "DuplicateTokenError";
  }
}
