import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Leave off in production, where
   * structured JSON lines are expected.
   */
  prettify?: boolean
}
