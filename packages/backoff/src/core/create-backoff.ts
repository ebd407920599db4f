import type { Milliseconds } from "@objectfs/clock"
import type { DelayPolicy, JitterStrategy } from "../ports/delay-policy"

export type CreateBackoffOptions = {
  strategy: DelayPolicy
  jitter?: JitterStrategy

  /** Floor for delay. Must be finite, non-negative. */
  min: Milliseconds

  /** Ceiling for delay. Must be finite, non-negative, >= min. */
  max: Milliseconds
}

function assertBound(name: string, ms: Milliseconds): void {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`${name} must be finite and >= 0 (got ${ms})`)
  }
}

/**
 * Wraps a strategy so every delay is a finite integer within [min, max].
 * Non-finite or negative strategy output falls back to `min`.
 */
export function createBackoff({
  strategy,
  jitter,
  min,
  max,
}: CreateBackoffOptions): DelayPolicy {
  assertBound("min", min)
  assertBound("max", max)
  if (max < min) {
    throw new RangeError(`max must be >= min (got ${max} < ${min})`)
  }

  return {
    delayFor(attempt: number): Milliseconds {
      const raw = strategy.delayFor(attempt)
      const jittered = jitter ? jitter.apply(raw) : raw
      const sane = Number.isFinite(jittered) && jittered >= 0 ? jittered : min

      return Math.floor(Math.min(max, Math.max(min, sane)))
    },
  }
}
