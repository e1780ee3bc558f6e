/**
 * Time source for the monitor loop
 *
 * The loop never calls Date.now or setTimeout directly, so tests can run it
 * under fake timers or a hand-driven clock.
 */

export interface Clock {
  now(): number;
  /** Resolve after ms, or as soon as the signal aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", done);
        resolve();
      };
      const timer = setTimeout(done, Math.max(0, ms));
      signal?.addEventListener("abort", done, { once: true });
    }),
};

/**
 * Next drift-corrected tick: the first multiple of interval after the
 * previous tick that is not in the past. Ticks missed while a cycle ran
 * long are skipped, not bunched up.
 */
export function nextTick(previousTick: number, intervalMs: number, now: number): number {
  const elapsed = Math.max(0, now - previousTick);
  const steps = Math.max(1, Math.ceil(elapsed / intervalMs));
  return previousTick + steps * intervalMs;
}
