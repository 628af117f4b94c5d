export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Races a promise against a timer. Rejects with a TimeoutError if the timer
 * fires first. A non-positive `ms` disables the timer.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number | undefined,
  label = "Operation",
): Promise<T> {
  if (ms === undefined || ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`, ms)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

/** True once `timeoutSeconds` have elapsed since `startedAtMs`. */
export function deadlinePassed(
  startedAtMs: number,
  timeoutSeconds: number | undefined,
  nowMs: number,
): boolean {
  if (timeoutSeconds === undefined || timeoutSeconds <= 0) return false;
  return nowMs - startedAtMs >= timeoutSeconds * 1000;
}
