import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds.
   * Rejects with an `AbortError` if `signal` aborts before the delay ends.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
