import type { Milliseconds, UnixMs } from "@objectfs/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** Epoch ms when the first attempt started */
  startedAt: UnixMs

  elapsedMs: Milliseconds

  signal?: AbortSignal
}

export interface RetryAttemptInfo extends AttemptContext {
  /** Delay before the next attempt, null when no attempt follows */
  nextDelayMs: Milliseconds | null
}
