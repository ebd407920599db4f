import type { AttemptContext } from "./attempt-context"
import type { RetryPolicy } from "./retry-policy"
import type { RetryResult } from "./retry-result"

export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>

/**
 * Runs an operation up to `policy.maxAttempts` times with backoff between
 * attempts.
 *
 * @remarks
 * - `execute()` rejects with the last failure (or an AbortError when aborted).
 * - `tryExecute()` resolves with a result wrapper instead of rejecting.
 * - Policy validation errors and throwing observers propagate from both.
 */
export interface RetryExecutor {
  execute<T>(fn: RetryFn<T>, policy: RetryPolicy): Promise<T>
  tryExecute<T>(fn: RetryFn<T>, policy: RetryPolicy): Promise<RetryResult<T>>
}
