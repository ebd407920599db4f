import type { Milliseconds } from "@objectfs/clock"

/**
 * Delay to wait before the next attempt; `attempt` is the 0-indexed attempt that
 * just failed.
 */
export interface DelayPolicy {
  delayFor(attempt: number): Milliseconds
}

/**
 * Spreads a computed delay to keep concurrent clients from retrying in lockstep.
 * Implementations are not trusted to return sane values; `createBackoff` clamps.
 */
export interface JitterStrategy {
  apply(delay: Milliseconds): Milliseconds
}
