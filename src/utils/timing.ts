/**
 * Timing helpers shared by the writer, the shutdown sequence and the client
 */

/** Sleep for specified milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll `condition` every `intervalMs` until it holds or `timeoutMs` elapses.
 * Resolves true if the condition held in time.
 */
export async function pollUntil(
  condition: () => boolean,
  timeoutMs: number,
  intervalMs: number,
): Promise<boolean> {
  if (condition()) return true;
  let waited = 0;
  while (waited < timeoutMs) {
    await sleep(intervalMs);
    waited += intervalMs;
    if (condition()) return true;
  }
  return false;
}

/** Thrown by withTimeout when the wrapped promise does not settle in time */
export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number, what: string) {
    super(`${what} did not finish within ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Race a promise against a timer; the timer never keeps the process alive */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new TimeoutError(timeoutMs, what)), timeoutMs);
    timer.unref();
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
