export { systemRandom } from "./adapters/random"
export { type CreateBackoffOptions, createBackoff } from "./core/create-backoff"
export { fullJitter } from "./core/jitter/full"
export { constant } from "./core/strategies/constant"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type { DelayPolicy, JitterStrategy } from "./ports/delay-policy"
export type { RandomSource } from "./ports/random-source"
