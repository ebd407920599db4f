import type { LogContextPatch, LogMeta } from "./log-context"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Logger that adds `context` to every entry it writes. The parent is not
   * affected; on key conflicts the child's value wins.
   */
  child(context: LogContextPatch): Logger
}
