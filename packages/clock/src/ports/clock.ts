import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Wall-clock time. Prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Milliseconds since the Unix epoch; entry ages and durations are computed from this. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Resolve after `ms` milliseconds of this clock's time.
   *
   * Aborting `signal` resolves the sleep early and releases its timer. Never rejects.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

/** Everything time-dependent code needs: reading the time and waiting on it. */
export type Clock = TimeSource & Sleeper
