/**
 * Races `promise` against a timer. A non-positive or non-finite
 * `timeoutMs` disables the timer.
 *
 * The timer is always cleared, and a late rejection of `promise` is
 * absorbed by the race instead of surfacing as unhandled.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    }),
  ]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
