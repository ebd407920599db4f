import { Writable } from "node:stream"
import {
  ObjectStoreError,
  ObjectStoreErrorCode,
  type ObjectStoreErrorContext,
} from "@objectfs/errors"
import type { Logger } from "@objectfs/logger"
import type { RetryExecutor, RetryPolicy } from "@objectfs/retry"
import type {
  ObjectKey,
  ObjectStoreBucket,
  ObjectStoreClient,
} from "../../ports/object-store-client"
import type { ObjectOutput } from "../../ports/under-file-system"

export interface ObjectOutputDeps {
  client: ObjectStoreClient
  retry: RetryExecutor
  retryPolicy: RetryPolicy
  logger: Logger
}

type OutputState = "open" | "closing" | "closed" | "aborted"

/** Shared state handling for output sinks; subclasses provide the storage. */
export abstract class BaseObjectOutput implements ObjectOutput {
  private state: OutputState = "open"
  private closing: Promise<void> | null = null
  private failure: ObjectStoreError | null = null

  protected constructor(
    protected readonly deps: ObjectOutputDeps,
    readonly bucket: ObjectStoreBucket,
    readonly key: ObjectKey,
  ) {}

  async write(data: Uint8Array | string): Promise<void> {
    this.ensureOpen("write")

    const bytes = typeof data === "string" ? Buffer.from(data, "utf-8") : data
    if (bytes.length === 0) return

    await this.append(bytes)
  }

  /** Rejects with the recorded failure when the output was aborted by one. */
  close(): Promise<void> {
    if (this.state === "aborted") {
      return this.failure ? Promise.reject(this.failure) : Promise.resolve()
    }

    this.closing ??= this.runClose()
    return this.closing
  }

  async abort(): Promise<void> {
    if (this.state === "closed" || this.state === "aborted") return

    this.state = "aborted"
    await this.discard()
  }

  toWritable(): Writable {
    return new Writable({
      write: (chunk: unknown, _encoding, callback) => {
        const bytes = chunk instanceof Uint8Array ? chunk : Buffer.from(String(chunk))
        void this.write(bytes).then(() => callback(), callback)
      },
      final: (callback) => {
        void this.close().then(() => callback(), callback)
      },
      destroy: (err, callback) => {
        if (this.state !== "open") {
          callback(err)
          return
        }
        void this.abort().then(
          () => callback(err),
          () => callback(err),
        )
      },
    })
  }

  protected abstract append(bytes: Uint8Array): Promise<void>
  protected abstract commit(): Promise<void>
  protected abstract discard(): Promise<void>

  /** Aborts the output and records `error` so a later `close()` rejects with it. */
  protected async failWith(error: ObjectStoreError): Promise<never> {
    this.failure ??= error
    await this.abort()
    throw error
  }

  protected writeFailed(
    message: string,
    cause: unknown,
    context: ObjectStoreErrorContext = {},
  ): ObjectStoreError {
    return new ObjectStoreError(message, {
      code: ObjectStoreErrorCode.WriteFailed,
      context: { bucket: this.bucket, key: this.key, ...context },
      cause,
    })
  }

  private async runClose(): Promise<void> {
    this.state = "closing"

    try {
      await this.commit()
    } finally {
      this.state = "closed"
    }
  }

  private ensureOpen(operation: string): void {
    if (this.state === "open") return

    throw new ObjectStoreError(`Output for ${this.bucket}/${this.key} is ${this.state}`, {
      code:
        this.state === "aborted"
          ? ObjectStoreErrorCode.UploadAborted
          : ObjectStoreErrorCode.StreamClosed,
      context: { bucket: this.bucket, key: this.key, operation },
    })
  }
}
