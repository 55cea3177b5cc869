import { ErrorDetails, SourceTimeoutError } from './errors';

/**
 * Rejects with `SourceTimeoutError` when `operation` does not settle within
 * `timeoutMs`.
 *
 * NOTE: This only detects timeouts, it does NOT cancel the underlying operation.
 * Adapters that can stop early should also observe the abort signal they get.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  details: Omit<ErrorDetails, 'originalError'> = {},
): Promise<T> {
  let timerId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timerId = setTimeout(() => {
        reject(new SourceTimeoutError(timeoutMs, details));
      }, timeoutMs);
    });

    return await Promise.race([operation(), timeoutPromise]);
  } finally {
    // Clear the pending timer on every outcome
    if (timerId !== undefined) {
      clearTimeout(timerId);
    }
  }
}
