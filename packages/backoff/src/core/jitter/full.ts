import type { Milliseconds } from "@objectfs/clock"
import { systemRandom } from "../../adapters/random"
import type { JitterStrategy } from "../../ports/delay-policy"
import type { RandomSource } from "../../ports/random-source"

/** Uniform pick in [0, delay]. */
export function fullJitter(random: RandomSource = systemRandom): JitterStrategy {
  return {
    apply(delay: Milliseconds): Milliseconds {
      return Math.floor(random.next() * (delay + 1))
    },
  }
}
