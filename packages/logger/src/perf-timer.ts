/**
 * @fileoverview Millisecond timers for `duration_ms` log fields.
 */

export interface PerfTimer {
  readonly startTime: number;

  /** Milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Freezes the duration; later calls return the same value */
  stop(): number;

  isRunning(): boolean;
}

/**
 * Starts a timer on `performance.now()`. Durations are rounded to whole
 * milliseconds.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const bars = await provider.getDailyBars(query);
 * logger.info('Fetched daily bars', { count: bars.length, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(clock: () => number = () => performance.now()): PerfTimer {
  const startTime = clock();
  let endTime: number | null = null;

  return {
    startTime,

    elapsed(): number {
      return Math.round((endTime ?? clock()) - startTime);
    },

    stop(): number {
      if (endTime === null) {
        endTime = clock();
      }
      return Math.round(endTime - startTime);
    },

    isRunning(): boolean {
      return endTime === null;
    },
  };
}

export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  return { result, duration_ms: timer.stop() };
}

export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
