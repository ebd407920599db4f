import type { ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

export const ObjectStoreErrorCode = {
  /** Object or tag set is absent. Stat-like calls turn this into `null`. */
  NotFound: "object_not_found",
  /** Network failure, timeout, throttling or 5xx; worth retrying. */
  Transient: "transient_transport",
  /** Malformed request, auth failure or other 4xx; never retried. */
  Permanent: "permanent_client",
  WriteFailed: "write_failed",
  UploadAborted: "upload_aborted",
  StreamClosed: "stream_closed",
} as const

export type ObjectStoreErrorCode =
  (typeof ObjectStoreErrorCode)[keyof typeof ObjectStoreErrorCode]

export type ObjectStoreErrorContext = ErrorContext & {
  bucket?: string
  key?: string
  operation?: string
  uploadId?: string
  partNumber?: number
}

export type ObjectStoreErrorOptions = {
  code: ObjectStoreErrorCode
  context?: ObjectStoreErrorContext
  cause?: unknown

  /** Status reported by the store (HTTP status for S3-compatible stores) */
  status?: number
}

/**
 * The only error kind the adapter lets escape. Store-specific failures are
 * translated into one of the codes above, keeping the store's status.
 */
export class ObjectStoreError extends BaseError<ObjectStoreErrorCode> {
  readonly status: number | undefined

  constructor(message: string, options: ObjectStoreErrorOptions) {
    super(message, {
      code: options.code,
      context: {
        ...options.context,
        ...(options.status !== undefined && { status: options.status }),
      },
      cause: options.cause,
      isRetryable: options.code === ObjectStoreErrorCode.Transient,
    })

    this.status = options.status
  }

  static notFound(
    message: string,
    options: Omit<ObjectStoreErrorOptions, "code"> = {},
  ): ObjectStoreError {
    return new ObjectStoreError(message, { ...options, code: ObjectStoreErrorCode.NotFound })
  }

  static transient(
    message: string,
    options: Omit<ObjectStoreErrorOptions, "code"> = {},
  ): ObjectStoreError {
    return new ObjectStoreError(message, { ...options, code: ObjectStoreErrorCode.Transient })
  }

  static permanent(
    message: string,
    options: Omit<ObjectStoreErrorOptions, "code"> = {},
  ): ObjectStoreError {
    return new ObjectStoreError(message, { ...options, code: ObjectStoreErrorCode.Permanent })
  }
}

export function isObjectStoreError(
  err: unknown,
  code?: ObjectStoreErrorCode,
): err is ObjectStoreError {
  return err instanceof ObjectStoreError && (code === undefined || err.code === code)
}

export function isNotFoundError(err: unknown): err is ObjectStoreError {
  return isObjectStoreError(err, ObjectStoreErrorCode.NotFound)
}
