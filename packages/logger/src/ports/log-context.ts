/**
 * Well-known fields carried by adapter log entries. Loggers accept any other
 * field too; these are the ones the adapter itself sets.
 */
export type LogContext = {
  service: string
  module: string

  bucket: string
  key: string
  path: string
  operation: string

  uploadId: string
  partNumber: number
  attempt: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta = Partial<LogContext> & Partial<LogEvent> & Record<string, unknown>

/** Fields a child logger adds to, or overrides in, its parent's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
