/**
 * Loads raw configuration values; no validation, coercion or merging.
 * Sources are applied in order, later ones overriding earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env", "dotenv:.env" */
  readonly name: string

  /** An `undefined` value means "not provided". */
  load(): Promise<Record<string, unknown>>
}
