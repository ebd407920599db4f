import type { Milliseconds } from "@objectfs/clock"
import type { DelayPolicy } from "../../ports/delay-policy"

export function constant(delay: Milliseconds): DelayPolicy {
  return { delayFor: () => delay }
}
