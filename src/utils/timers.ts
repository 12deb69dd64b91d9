/**
 * Safe Timer Utilities
 *
 * Timers here call .unref() so they never keep the Node event loop alive.
 */

type TimerCallback = () => void;

/**
 * setTimeout that won't keep the process alive.
 * Returns the timer ID for clearTimeout().
 */
export function safeTimeout(fn: TimerCallback, ms: number): ReturnType<typeof setTimeout> {
  const timer = setTimeout(fn, ms);
  if (typeof timer === "object" && "unref" in timer) timer.unref();
  return timer;
}

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Race a promise against a deadline. The underlying work is not cancelled;
 * callers release whatever it holds.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = safeTimeout(() => reject(new TimeoutError(label, ms)), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}
