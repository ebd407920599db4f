import { createBackoff, exponential, fullJitter, type RandomSource } from "@objectfs/backoff"
import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@objectfs/config"
import { isRetryableError } from "@objectfs/errors"
import { type Logger, logLevelNames } from "@objectfs/logger"
import type { RetryPolicy } from "@objectfs/retry"
import { z } from "zod"
import type { CreateS3ClientOptions } from "../adapters/create"
import type { UfsOptions } from "../ports/ufs-options"

export const UFS_ENV_PREFIX = "OBJECTFS_"

const MiB = 1024 * 1024

const flag = z.union([z.boolean(), z.stringbool()])
const positiveInt = z.coerce.number().int().min(1)
const nonNegativeInt = z.coerce.number().int().min(0)

export const ufsConfigSchema = z.object({
  BUCKET: z.string().min(1),
  REGION: z.string().min(1).default("us-east-1"),
  ENDPOINT: z.url().optional(),
  FORCE_PATH_STYLE: flag.default(false),
  KEYSPACE_PREFIX: z.string().default(""),

  MULTIPART_UPLOAD_ENABLED: flag.default(false),
  MULTIPART_UPLOAD_THREADS: positiveInt.default(20),
  MULTIPART_PART_SIZE_BYTES: positiveInt.default(64 * MiB),
  READ_CHUNK_SIZE_BYTES: positiveInt.default(8 * MiB),
  LISTING_PAGE_SIZE: positiveInt.max(1000).default(1000),
  DELETE_BATCH_SIZE: positiveInt.max(1000).default(1000),
  TMP_DIRS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((dir) => dir.trim())
        .filter(Boolean),
    ),

  CONNECTION_TIMEOUT_MS: positiveInt.default(50_000),
  SOCKET_TIMEOUT_MS: positiveInt.default(50_000),
  MAX_CONNECTIONS: positiveInt.default(1024),

  RETRY_MAX_ATTEMPTS: positiveInt.default(3),
  RETRY_BASE_DELAY_MS: nonNegativeInt.default(100),
  RETRY_MAX_DELAY_MS: nonNegativeInt.default(5000),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type UfsConfig = z.output<typeof ufsConfigSchema>

export interface LoadUfsConfigOptions {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Optional .env file read before the environment. */
  dotenvFile?: string

  /** Applied last, keys without the prefix. */
  overrides?: Record<string, unknown>
}

/** Reads `OBJECTFS_*` settings from an optional .env file, the environment and overrides. */
export function loadUfsConfig(options: LoadUfsConfigOptions = {}): Promise<IConfig<UfsConfig>> {
  const sources: ConfigSource[] = [
    ...(options.dotenvFile
      ? [new DotenvSource({ file: options.dotenvFile, required: false, prefix: UFS_ENV_PREFIX })]
      : []),
    new EnvSource({ prefix: UFS_ENV_PREFIX, ...(options.env && { env: options.env }) }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  return loadConfig({ schema: ufsConfigSchema, sources })
}

export function toUfsOptions(config: UfsConfig): UfsOptions {
  return {
    bucket: config.BUCKET,
    keyspacePrefix: config.KEYSPACE_PREFIX,
    multipartUploadEnabled: config.MULTIPART_UPLOAD_ENABLED,
    multipartUploadThreads: config.MULTIPART_UPLOAD_THREADS,
    multipartPartSizeBytes: config.MULTIPART_PART_SIZE_BYTES,
    readChunkSizeBytes: config.READ_CHUNK_SIZE_BYTES,
    listingPageSize: config.LISTING_PAGE_SIZE,
    deleteBatchSize: config.DELETE_BATCH_SIZE,
    tmpDirs: config.TMP_DIRS,
  }
}

export function toS3ClientOptions(config: UfsConfig): CreateS3ClientOptions {
  return {
    region: config.REGION,
    ...(config.ENDPOINT !== undefined && { endpoint: config.ENDPOINT }),
    forcePathStyle: config.FORCE_PATH_STYLE,
    connectionTimeoutMs: config.CONNECTION_TIMEOUT_MS,
    socketTimeoutMs: config.SOCKET_TIMEOUT_MS,
    maxConnections: config.MAX_CONNECTIONS,
  }
}

export interface UfsRetryPolicyDeps {
  logger: Logger
  random?: RandomSource
}

/**
 * Exponential backoff with full jitter, retrying only errors that declare
 * themselves retryable.
 */
export function createUfsRetryPolicy(config: UfsConfig, deps: UfsRetryPolicyDeps): RetryPolicy {
  const { logger } = deps

  return {
    maxAttempts: config.RETRY_MAX_ATTEMPTS,
    delay: createBackoff({
      strategy: exponential({ base: config.RETRY_BASE_DELAY_MS }),
      jitter: fullJitter(deps.random),
      min: 0,
      max: Math.max(config.RETRY_MAX_DELAY_MS, config.RETRY_BASE_DELAY_MS),
    }),
    shouldRetry: (error) => isRetryableError(error),
    observer: {
      onRetry: (err, info) => {
        logger.debug("retrying store call", {
          attempt: info.attempt + 1,
          nextDelayMs: info.nextDelayMs,
          err,
        })
      },
      onExhausted: (err, info) => {
        logger.debug("store call failed", { attempt: info.attempt + 1, err })
      },
    },
  }
}
