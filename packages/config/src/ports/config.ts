/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ LISTING_PAGE_SIZE: z.coerce.number().default(1000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("LISTING_PAGE_SIZE")     // 1000
 * config.explain("LISTING_PAGE_SIZE") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that supplied at least one value, without duplicates. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know (typos, stale keys). */
  unknownKeys(): string[]
}
