/**
 * Timestamp and timer helpers
 */

/**
 * Convert a Date to integer microseconds since the Unix epoch
 */
export function toMicros(date: Date): number {
  return date.getTime() * 1000;
}

/**
 * Convert integer microseconds since the Unix epoch to a Date
 * Sub-millisecond precision is truncated.
 */
export function fromMicros(micros: number): Date {
  return new Date(Math.floor(micros / 1000));
}

/**
 * Longest delay setTimeout honours; larger values fire after about 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function isTimerDelay(ms: number): boolean {
  return Number.isInteger(ms) && ms > 0 && ms <= MAX_TIMER_DELAY_MS;
}

/**
 * Race a promise against a deadline.
 * The timer is always cleared; the losing promise is left to settle on its own.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
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
