import { isObjectStoreError, ObjectStoreError } from "@objectfs/errors"
import type { RetryExecutor, RetryPolicy } from "@objectfs/retry"
import type {
  ObjectKey,
  ObjectStoreBucket,
  ObjectStoreClient,
} from "../../ports/object-store-client"

export interface RangeReaderDeps {
  client: ObjectStoreClient
  retry: RetryExecutor
  retryPolicy: RetryPolicy
}

export interface RangeReaderOptions {
  bucket: ObjectStoreBucket

  /** Upper bound of one ranged GET */
  chunkSizeBytes: number
}

/**
 * Ranged reads that survive short and interrupted bodies. Every request,
 * including the ones issued by a retry, starts at the first byte not yet
 * received.
 */
export class RangeReader {
  constructor(
    readonly deps: RangeReaderDeps,
    readonly options: RangeReaderOptions,
  ) {}

  /**
   * Copies object bytes `[position, position + length)` into `target` at
   * `offset`, clipped to `objectLength`. Resolves to the number of bytes copied.
   */
  async read(
    key: ObjectKey,
    position: number,
    target: Uint8Array,
    offset: number,
    length: number,
    objectLength: number,
  ): Promise<number> {
    const end = Math.min(position + length, objectLength)
    if (position >= end) return 0

    let received = 0

    await this.deps.retry.execute(async () => {
      while (position + received < end) {
        const start = position + received
        const stop = Math.min(end, start + this.options.chunkSizeBytes)

        const got = await this.fetch(key, start, stop, (bytes) => {
          target.set(bytes, offset + received)
          received += bytes.length
        })

        if (got === 0) {
          throw ObjectStoreError.transient(`Empty body for bytes ${start}-${stop - 1}`, {
            context: { bucket: this.options.bucket, key, operation: "getObjectRange" },
          })
        }
      }
    }, this.deps.retryPolicy)

    return received
  }

  /** One GET for `[start, stop)`; resolves to the bytes delivered, possibly fewer. */
  private async fetch(
    key: ObjectKey,
    start: number,
    stop: number,
    onBytes: (bytes: Uint8Array) => void,
  ): Promise<number> {
    const { bucket } = this.options
    const body = await this.deps.client.getObjectRange(bucket, key, start, stop - 1)

    let got = 0
    try {
      for await (const chunk of body) {
        const bytes = toBytes(chunk)
        const take = Math.min(bytes.length, stop - start - got)

        onBytes(bytes.subarray(0, take))
        got += take

        if (start + got >= stop) break
      }
    } catch (err) {
      if (isObjectStoreError(err)) throw err

      throw ObjectStoreError.transient(`Body of ${bucket}/${key} was interrupted`, {
        context: { bucket, key, operation: "getObjectRange" },
        cause: err,
      })
    } finally {
      body.destroy()
    }

    return got
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk
  if (typeof chunk === "string") return Buffer.from(chunk)

  throw new TypeError(`Unexpected body chunk of type ${typeof chunk}`)
}
