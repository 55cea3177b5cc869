import { CancelledOperation } from '../engines/errors';

class AbortedError extends Error {
  constructor() {
    super('Aborted');
    this.name = 'AbortedError';
  }
}

/**
 * Races a promise against an abort signal. The underlying work is not
 * stopped, its result is just no longer awaited.
 */
export async function toAbortablePromise<R>({
  promise,
  signal,
  onFinalize,
}: {
  promise: Promise<R>;
  signal: AbortSignal;
  onFinalize?: () => void | Promise<void>;
}): Promise<{ value: R; aborted: false } | { value: undefined; aborted: true }> {
  let onAbort: (() => void) | undefined;

  try {
    const ret = await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        if (signal.aborted) {
          reject(new AbortedError());
          return;
        }
        onAbort = () => reject(new AbortedError());
        signal.addEventListener('abort', onAbort, { once: true });
      }),
    ]);

    return { value: ret, aborted: false };
  } catch (error) {
    if (error instanceof AbortedError) {
      return { value: undefined, aborted: true };
    }
    throw error;
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
    await onFinalize?.();
  }
}

/**
 * Cooperative cancellation point for long running loops.
 *
 * @throws CancelledOperation if the signal is aborted
 */
export function throwIfAborted(signal: AbortSignal | undefined, reason: string): void {
  if (signal?.aborted) {
    throw new CancelledOperation(reason);
  }
}
