export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (bucket, key, operation, ...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if retrying the same operation might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`: missing object, network timeout, throttling)
   * versus programmer error or broken invariant (`false`).
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
