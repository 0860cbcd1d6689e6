/**
 * Timeout Guard
 *
 * Wraps promises with timeout protection so a slow upstream
 * (geocoder, Overpass, LLM) cannot hang a request.
 */

export class TimeoutError extends Error {
  constructor(
    public operation: string,
    public timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Wrap a promise with a timeout
 *
 * If the promise doesn't resolve within timeoutMs, rejects with
 * TimeoutError and then calls onTimeout
 *
 * @param operation - Name of operation (for error messages)
 * @param onTimeout - Optional callback when timeout triggers (e.g. () => controller.abort())
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
      onTimeout?.();
    }, timeoutMs);
  });
  return Promise.race([promise, timeoutPromise]).finally(() => clearTimeout(timeoutId));
}

/**
 * Run an abortable operation with a deadline.
 * The signal handed to `fn` aborts when the deadline passes.
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  const controller = new AbortController();
  return withTimeout(fn(controller.signal), timeoutMs, operation, () => controller.abort());
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
