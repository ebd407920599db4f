import { ObjectStoreError, ObjectStoreErrorCode } from "@objectfs/errors"
import type {
  CompletedPart,
  ObjectKey,
  ObjectStoreBucket,
} from "../../ports/object-store-client"
import type { BoundedPool } from "../concurrency/bounded-pool"
import { BaseObjectOutput, type ObjectOutputDeps } from "./base-object-output"

export interface MultipartOutputStreamDeps extends ObjectOutputDeps {
  /** Shared part pool; resolved on the first full part. */
  pool: () => BoundedPool
}

export interface MultipartOutputStreamOptions {
  bucket: ObjectStoreBucket
  key: ObjectKey
  partSizeBytes: number
}

/**
 * Splits writes into fixed-size parts uploaded through a shared pool. The
 * session starts with the first full part; a stream closed before that is
 * written with a single PUT instead.
 *
 * Part numbers follow write order and `complete` lists them ascending, so the
 * order in which uploads finish does not matter. A failed part aborts the
 * session; the next `write()` and `close()` reject.
 */
export class MultipartOutputStream extends BaseObjectOutput {
  private pending: Uint8Array[] = []
  private pendingBytes = 0

  private uploadId: string | null = null
  private nextPartNumber = 1
  private readonly uploads: Promise<CompletedPart>[] = []
  private partFailure: unknown = null

  constructor(
    protected override readonly deps: MultipartOutputStreamDeps,
    readonly options: MultipartOutputStreamOptions,
  ) {
    super(deps, options.bucket, options.key)

    if (!Number.isInteger(options.partSizeBytes) || options.partSizeBytes < 1) {
      throw new RangeError(`partSizeBytes must be an integer >= 1 (got ${options.partSizeBytes})`)
    }
  }

  get sessionId(): string | null {
    return this.uploadId
  }

  protected async append(bytes: Uint8Array): Promise<void> {
    await this.failFast()

    this.pending.push(Uint8Array.from(bytes))
    this.pendingBytes += bytes.length

    const { partSizeBytes } = this.options
    if (this.pendingBytes < partSizeBytes) return

    let buffered = Buffer.concat(this.pending, this.pendingBytes)
    while (buffered.length >= partSizeBytes) {
      const uploadId = this.uploadId
      try {
        await this.submitPart(buffered.subarray(0, partSizeBytes))
      } catch (err) {
        await this.failWith(
          this.writeFailed(`Part upload failed for ${this.bucket}/${this.key}`, err, {
            operation: "uploadPart",
            ...(uploadId !== null && { uploadId }),
          }),
        )
      }
      buffered = buffered.subarray(partSizeBytes)
    }

    this.pending = buffered.length > 0 ? [buffered] : []
    this.pendingBytes = buffered.length
  }

  protected async commit(): Promise<void> {
    const { client, retry, retryPolicy } = this.deps
    const { bucket, key } = this
    const rest = Buffer.concat(this.pending, this.pendingBytes)
    this.pending = []
    this.pendingBytes = 0

    if (this.uploadId === null) {
      try {
        await retry.execute(() => client.putObject(bucket, key, rest, rest.length), retryPolicy)
      } catch (err) {
        throw this.writeFailed(`Failed to write ${bucket}/${key}`, err, { operation: "putObject" })
      }
      return
    }

    const uploadId = this.uploadId

    if (rest.length > 0) {
      try {
        await this.submitPart(rest)
      } catch (err) {
        await Promise.allSettled(this.uploads)
        await this.abortSession()
        throw this.writeFailed(`Part upload failed for ${bucket}/${key}`, err, {
          operation: "uploadPart",
          uploadId,
        })
      }
    }

    const settled = await Promise.allSettled(this.uploads)
    const rejected = settled.find((r): r is PromiseRejectedResult => r.status === "rejected")

    if (rejected) {
      await this.abortSession()
      throw this.writeFailed(`Part upload failed for ${bucket}/${key}`, rejected.reason, {
        operation: "uploadPart",
        uploadId,
      })
    }

    const parts = settled
      .flatMap((r) => (r.status === "fulfilled" ? [r.value] : []))
      .sort((a, b) => a.partNumber - b.partNumber)

    try {
      await retry.execute(
        () => client.completeMultipartUpload(bucket, key, uploadId, parts),
        retryPolicy,
      )
    } catch (err) {
      await this.abortSession()
      throw this.writeFailed(`Failed to complete upload of ${bucket}/${key}`, err, {
        operation: "completeMultipartUpload",
        uploadId,
      })
    }

    this.deps.logger.debug("multipart upload completed", {
      key,
      uploadId,
      parts: parts.length,
    })
  }

  protected async discard(): Promise<void> {
    this.pending = []
    this.pendingBytes = 0

    if (this.uploadId !== null) {
      await Promise.allSettled(this.uploads)
      await this.abortSession()
    }
  }

  private async submitPart(body: Buffer): Promise<void> {
    const { client, retry, retryPolicy, logger } = this.deps
    const { bucket, key } = this

    if (this.uploadId === null) {
      this.uploadId = await retry.execute(
        () => client.initiateMultipartUpload(bucket, key),
        retryPolicy,
      )
      logger.debug("multipart upload initiated", { key, uploadId: this.uploadId })
    }

    const uploadId = this.uploadId
    const partNumber = this.nextPartNumber++
    const part = Buffer.from(body)

    const upload = this.deps.pool().submit(async () => {
      const etag = await retry.execute(
        () => client.uploadPart(bucket, key, uploadId, partNumber, part),
        retryPolicy,
      )
      return { partNumber, etag }
    })

    void upload.catch((err: unknown) => {
      this.partFailure ??= err
    })
    this.uploads.push(upload)
  }

  private async failFast(): Promise<void> {
    if (this.partFailure === null) return

    const uploadId = this.uploadId
    await this.failWith(
      new ObjectStoreError(`Upload of ${this.bucket}/${this.key} was aborted`, {
        code: ObjectStoreErrorCode.UploadAborted,
        context: {
          bucket: this.bucket,
          key: this.key,
          operation: "uploadPart",
          ...(uploadId !== null && { uploadId }),
        },
        cause: this.partFailure,
      }),
    )
  }

  private async abortSession(): Promise<void> {
    const uploadId = this.uploadId
    if (uploadId === null) return

    const { client, retry, retryPolicy, logger } = this.deps
    this.uploadId = null

    try {
      await retry.execute(
        () => client.abortMultipartUpload(this.bucket, this.key, uploadId),
        retryPolicy,
      )
      logger.warn("multipart upload aborted", { key: this.key, uploadId })
    } catch (err) {
      logger.error("failed to abort multipart upload", { key: this.key, uploadId, err })
    }
  }
}
