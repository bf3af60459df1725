import { isSequencerError } from "@chatseq/sequencer";
import { NotFoundError, ValidationError } from "../domain/errors";

/** Status code a transport should answer with when a chat operation throws `error`. */
export function httpStatusFor(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ValidationError) return 422;
  if (isSequencerError(error)) {
    return error.code === "SCOPE_NOT_FOUND" ? 404 : 503;
  }
  return 500;
}

/** Whether the caller may send the same request again. */
export function isRetryable(error: unknown) {
  return isSequencerError(error) && error.retryable;
}
