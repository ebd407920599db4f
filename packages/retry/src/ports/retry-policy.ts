import type { DelayPolicy } from "@objectfs/backoff"
import type { Milliseconds } from "@objectfs/clock"
import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks, mostly for logging. Hooks must not throw; a throwing hook is
 * a programmer error and propagates.
 */
export interface RetryObserver {
  onRetry?(error: unknown, info: RetryAttemptInfo): void
  onExhausted?(error: unknown, info: RetryAttemptInfo): void
}

/**
 * How an operation is retried.
 *
 * @remarks
 * `maxAttempts` is total tries, not retries: 1 means no retry.
 * Without `shouldRetry` every error is retried until attempts run out.
 */
export interface RetryPolicy {
  maxAttempts: number
  delay: DelayPolicy
  shouldRetry?: (error: unknown, ctx: AttemptContext) => boolean
  observer?: RetryObserver
  signal?: AbortSignal

  /** No new attempt starts once this much wall-clock time has passed. */
  maxElapsedMs?: Milliseconds
}
