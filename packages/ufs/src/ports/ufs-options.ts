import type { Logger } from "@objectfs/logger"
import type { RetryExecutor, RetryPolicy } from "@objectfs/retry"
import type { ObjectStoreBucket, ObjectStoreClient } from "./object-store-client"

export interface UfsDeps {
  client: ObjectStoreClient
  retry: RetryExecutor

  /** Applied to every single-object store call except listing continuation. */
  retryPolicy: RetryPolicy
  logger: Logger
}

export interface UfsOptions {
  bucket: ObjectStoreBucket

  /** Root of this filesystem inside the bucket, e.g. "tenants/42" */
  keyspacePrefix?: string

  /** @default false */
  multipartUploadEnabled?: boolean

  /** Size of the part upload pool shared by all multipart sessions. @default 20 */
  multipartUploadThreads?: number

  /** @default 64 MiB */
  multipartPartSizeBytes?: number

  /** Upper bound of one ranged GET. @default 8 MiB */
  readChunkSizeBytes?: number

  /** 1..1000. @default 1000 */
  listingPageSize?: number

  /** 1..1000. @default 1000 */
  deleteBatchSize?: number

  /**
   * Directories for single-shot spill files. Empty means writes are buffered
   * in memory.
   */
  tmpDirs?: readonly string[]
}

export type ResolvedUfsOptions = Required<UfsOptions>

export const MAX_STORE_BATCH_SIZE = 1000

export const DEFAULT_UFS_OPTIONS = {
  keyspacePrefix: "",
  multipartUploadEnabled: false,
  multipartUploadThreads: 20,
  multipartPartSizeBytes: 64 * 1024 * 1024,
  readChunkSizeBytes: 8 * 1024 * 1024,
  listingPageSize: 1000,
  deleteBatchSize: 1000,
  tmpDirs: [],
} as const satisfies Omit<ResolvedUfsOptions, "bucket">

function assertPositiveInt(name: string, value: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw new RangeError(`${name} must be an integer in [1, ${max}] (got ${value})`)
  }
}

export function resolveUfsOptions(options: UfsOptions): ResolvedUfsOptions {
  const resolved: ResolvedUfsOptions = { ...DEFAULT_UFS_OPTIONS, ...options }

  if (!resolved.bucket) throw new RangeError("bucket must not be empty")
  assertPositiveInt("multipartUploadThreads", resolved.multipartUploadThreads)
  assertPositiveInt("multipartPartSizeBytes", resolved.multipartPartSizeBytes)
  assertPositiveInt("readChunkSizeBytes", resolved.readChunkSizeBytes)
  assertPositiveInt("listingPageSize", resolved.listingPageSize, MAX_STORE_BATCH_SIZE)
  assertPositiveInt("deleteBatchSize", resolved.deleteBatchSize, MAX_STORE_BATCH_SIZE)

  return resolved
}
