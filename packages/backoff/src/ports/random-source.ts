/**
 * Source of randomness. `next()` MUST return a float in [0, 1).
 */
export interface RandomSource {
  next(): number
}
