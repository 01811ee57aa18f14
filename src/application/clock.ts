/**
 * Time source used to stamp network exchanges.
 * Substituted in tests for deterministic durations.
 */
export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): number;
  /** Milliseconds elapsed since `start` (a value previously returned by `now()`). */
  since(start: number): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  since(start: number): number {
    return Math.max(0, Date.now() - start);
  },
};
