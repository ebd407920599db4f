import type { AppError } from "../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date
  )
}

/** `true` only for errors that declare themselves retryable. */
export function isRetryableError(e: unknown): boolean {
  return isAppError(e) && e.isRetryable
}
