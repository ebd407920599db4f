import type { Milliseconds } from "@objectfs/clock"
import type { DelayPolicy } from "../../ports/delay-policy"

export interface ExponentialOptions {
  base: Milliseconds

  /** Multiplier per attempt. Default: 2 */
  factor?: number
}

export function exponential({ base, factor = 2 }: ExponentialOptions): DelayPolicy {
  return {
    delayFor(attempt: number): Milliseconds {
      return base * factor ** attempt
    },
  }
}
