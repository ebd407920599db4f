import type { Milliseconds } from "@objectfs/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult = {
  success: false
  /** The last failure observed */
  error: unknown
  attempts: number
  elapsedMs: Milliseconds
  reason: "exhausted" | "not_retryable" | "aborted" | "timed_out"
}

export type RetryResult<T> = SuccessfulRetryResult<T> | FailedRetryResult
