import type { Scope } from "./entities/Scope";

export type SequencerErrorCode =
  | "SCOPE_NOT_FOUND"
  | "PERSISTENCE_FAILURE"
  | "ALLOCATION_EXHAUSTED"
  | "AMBIGUOUS_COMMIT"
  | "STORE_TIMEOUT";

export abstract class SequencerError extends Error {
  abstract readonly code: SequencerErrorCode;
  /** Whether the caller may repeat the whole operation. */
  abstract readonly retryable: boolean;

  constructor(
    message: string,
    readonly scope: Scope,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ScopeNotFoundError extends SequencerError {
  readonly code = "SCOPE_NOT_FOUND";
  readonly retryable = false;

  constructor(scope: Scope) {
    super(`Scope ${scope} does not exist`, scope);
  }
}

export class PersistenceFailureError extends SequencerError {
  readonly code = "PERSISTENCE_FAILURE";
  readonly retryable = true;

  constructor(
    scope: Scope,
    readonly store: "durable" | "counter",
    options?: ErrorOptions
  ) {
    super(`The ${store} store failed for scope ${scope}`, scope, options);
  }
}

export class AllocationExhaustedError extends SequencerError {
  readonly code = "ALLOCATION_EXHAUSTED";
  readonly retryable = true;

  constructor(
    scope: Scope,
    readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(`No free number in scope ${scope} after ${attempts} attempts`, scope, options);
  }
}

export class AmbiguousCommitError extends SequencerError {
  readonly code = "AMBIGUOUS_COMMIT";
  readonly retryable = true;

  constructor(
    scope: Scope,
    readonly number: number,
    options?: ErrorOptions
  ) {
    super(`Could not tell whether number ${number} was committed in scope ${scope}`, scope, options);
  }
}

export class StoreTimeoutError extends SequencerError {
  readonly code = "STORE_TIMEOUT";
  readonly retryable = true;

  constructor(
    scope: Scope,
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} on scope ${scope} timed out after ${timeoutMs}ms`, scope);
  }
}

export function isSequencerError(error: unknown): error is SequencerError {
  return error instanceof SequencerError;
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
