/**
 * Promise timeout utility with proper cleanup (no timer leaks)
 *
 * @version 1.0.0
 */

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Wraps a promise with a timeout. The timer is cleared on resolve, reject
 * and timeout. When a controller is passed it is aborted on timeout so the
 * underlying work can stop.
 *
 * @throws TimeoutError if the promise does not settle within timeoutMs
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string,
  controller?: AbortController
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TimeoutError(errorMessage, timeoutMs);
      controller?.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
