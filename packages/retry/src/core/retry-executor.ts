import type { Clock } from "@objectfs/clock"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryExecutor, RetryFn } from "../ports/retry-executor"
import type { RetryPolicy } from "../ports/retry-policy"
import type { FailedRetryResult, RetryResult } from "../ports/retry-result"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): RetryExecutor {
  return new DefaultRetryExecutor(deps)
}

type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

class DefaultRetryExecutor implements RetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T>(fn: RetryFn<T>, policy: RetryPolicy): Promise<T> {
    const result = await this.tryExecute(fn, policy)
    if (result.success) return result.value

    throw result.error
  }

  async tryExecute<T>(fn: RetryFn<T>, policy: RetryPolicy): Promise<RetryResult<T>> {
    this.validate(policy)

    const { maxAttempts, signal, observer } = policy
    const startedAt = this.deps.clock.nowMs()
    let lastError: unknown = new Error("Retry budget elapsed before the first attempt")

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const ctx = this.buildContext(attempt, startedAt, signal)

      if (signal?.aborted) return this.failed(abortError(), attempt, ctx, "aborted")
      if (this.isTimedOut(ctx, policy)) {
        return this.failed(lastError, attempt, ctx, "timed_out")
      }

      const outcome = await this.attempt(fn, ctx)
      if (outcome.ok) {
        return {
          success: true,
          value: outcome.value,
          attempts: attempt + 1,
          elapsedMs: this.deps.clock.nowMs() - startedAt,
        }
      }

      lastError = outcome.error
      const retryable = policy.shouldRetry?.(outcome.error, ctx) ?? true
      const isLastAttempt = attempt === maxAttempts - 1

      if (!retryable || isLastAttempt) {
        observer?.onExhausted?.(outcome.error, this.info(ctx, null))
        return this.failed(
          outcome.error,
          attempt + 1,
          ctx,
          retryable ? "exhausted" : "not_retryable",
        )
      }

      const delayMs = this.clampDelay(policy.delay.delayFor(attempt), policy, startedAt)
      observer?.onRetry?.(outcome.error, this.info(ctx, delayMs))

      try {
        if (delayMs > 0) await this.deps.clock.sleep(delayMs, signal)
      } catch (err) {
        if (isAbortError(err)) {
          return this.failed(err, attempt + 1, ctx, "aborted")
        }
        throw err
      }
    }

    const ctx = this.buildContext(maxAttempts, startedAt, signal)
    return this.failed(lastError, maxAttempts, ctx, "exhausted")
  }

  private async attempt<T>(
    fn: RetryFn<T>,
    ctx: AttemptContext,
  ): Promise<AttemptOutcome<T>> {
    try {
      return { ok: true, value: await fn(ctx) }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private validate(policy: RetryPolicy): void {
    if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be an integer >= 1 (got ${policy.maxAttempts})`,
      )
    }

    const { maxElapsedMs } = policy
    if (maxElapsedMs === undefined) return

    if (!Number.isFinite(maxElapsedMs) || maxElapsedMs < 0) {
      throw new RangeError(
        `maxElapsedMs must be a finite number >= 0 (got ${maxElapsedMs})`,
      )
    }
  }

  private isTimedOut(ctx: AttemptContext, policy: RetryPolicy): boolean {
    // The first attempt always runs.
    if (ctx.attempt === 0 || policy.maxElapsedMs === undefined) return false
    return ctx.elapsedMs >= policy.maxElapsedMs
  }

  private clampDelay(delayMs: number, policy: RetryPolicy, startedAt: number): number {
    if (policy.maxElapsedMs === undefined) return delayMs

    const remaining = policy.maxElapsedMs - (this.deps.clock.nowMs() - startedAt)
    return Math.min(delayMs, Math.max(0, remaining))
  }

  private buildContext(
    attempt: number,
    startedAt: number,
    signal?: AbortSignal,
  ): AttemptContext {
    return {
      attempt,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
      ...(signal && { signal }),
    }
  }

  private info(ctx: AttemptContext, nextDelayMs: number | null): RetryAttemptInfo {
    return { ...ctx, nextDelayMs }
  }

  private failed(
    error: unknown,
    attempts: number,
    ctx: AttemptContext,
    reason: FailedRetryResult["reason"],
  ): FailedRetryResult {
    return {
      success: false,
      error,
      attempts,
      elapsedMs: this.deps.clock.nowMs() - ctx.startedAt,
      reason,
    }
  }
}

function abortError(): Error {
  return new DOMException("Aborted", "AbortError")
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError"
}
