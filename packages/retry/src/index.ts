export { createRetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { RetryExecutor, RetryFn } from "./ports/retry-executor"
export type { RetryObserver, RetryPolicy } from "./ports/retry-policy"
export type {
  FailedRetryResult,
  RetryResult,
  SuccessfulRetryResult,
} from "./ports/retry-result"
