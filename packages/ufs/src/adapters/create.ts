import { S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@objectfs/clock"
import type { Logger } from "@objectfs/logger"
import type { RetryExecutor, RetryPolicy } from "@objectfs/retry"
import { ObjectUnderFileSystem } from "../core/object-under-file-system"
import type { ObjectStoreClient } from "../ports/object-store-client"
import type { UfsOptions } from "../ports/ufs-options"
import { MemoryObjectStoreClient } from "./memory-object-store-client"
import { S3ObjectStoreClient } from "./s3-object-store-client"

export interface CreateS3ClientOptions {
  region: string
  endpoint?: string
  forcePathStyle?: boolean
  credentials?: { accessKeyId: string; secretAccessKey: string }
  connectionTimeoutMs?: number
  socketTimeoutMs?: number
  maxConnections?: number
}

/** SDK client with transport timeouts and socket limits applied. */
export function createS3Client(options: CreateS3ClientOptions): S3Client {
  return new S3Client({
    region: options.region,
    ...(options.endpoint && { endpoint: options.endpoint }),
    ...(options.forcePathStyle !== undefined && { forcePathStyle: options.forcePathStyle }),
    ...(options.credentials && { credentials: options.credentials }),
    // Retries are left to the adapter's retry policy.
    maxAttempts: 1,
    requestHandler: {
      ...(options.connectionTimeoutMs !== undefined && {
        connectionTimeout: options.connectionTimeoutMs,
      }),
      ...(options.socketTimeoutMs !== undefined && { requestTimeout: options.socketTimeoutMs }),
      ...(options.maxConnections !== undefined && {
        httpsAgent: { maxSockets: options.maxConnections },
        httpAgent: { maxSockets: options.maxConnections },
      }),
    },
  })
}

export interface CreateS3ObjectStoreClientOptions {
  client: S3Client
}

export function createS3ObjectStoreClient(
  options: CreateS3ObjectStoreClientOptions,
): ObjectStoreClient {
  return new S3ObjectStoreClient({ client: options.client })
}

export interface CreateMemoryObjectStoreClientOptions {
  clock: Clock
}

export function createMemoryObjectStoreClient(
  options: CreateMemoryObjectStoreClientOptions,
): MemoryObjectStoreClient {
  return new MemoryObjectStoreClient({ clock: options.clock })
}

export interface CreateUnderFileSystemOptions extends UfsOptions {
  client: ObjectStoreClient
  retry: RetryExecutor
  retryPolicy: RetryPolicy
  logger: Logger
}

export function createUnderFileSystem({
  client,
  retry,
  retryPolicy,
  logger,
  ...options
}: CreateUnderFileSystemOptions): ObjectUnderFileSystem {
  return new ObjectUnderFileSystem({ client, retry, retryPolicy, logger }, options)
}
