import { clearTimeout, setTimeout } from "node:timers";

/**
 * Rejects with `onTimeout()` when `promise` has not settled within
 * `timeoutMs`. A zero, negative or infinite timeout waits forever. The
 * underlying operation is not cancelled.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
