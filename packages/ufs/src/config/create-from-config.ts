import type { S3Client } from "@aws-sdk/client-s3"
import type { Clock } from "@objectfs/clock"
import { createPinoLogger, type Logger } from "@objectfs/logger"
import { createRetryExecutor } from "@objectfs/retry"
import { createS3Client } from "../adapters/create"
import { S3ObjectStoreClient } from "../adapters/s3-object-store-client"
import { ObjectUnderFileSystem } from "../core/object-under-file-system"
import { createUfsRetryPolicy, toS3ClientOptions, toUfsOptions, type UfsConfig } from "./ufs-config"

export interface S3UnderFileSystemDeps {
  clock: Clock

  /** Defaults to a pino logger at `LOG_LEVEL`. */
  logger?: Logger

  /** Defaults to a client built from the config's region and transport settings. */
  s3Client?: S3Client
}

export interface S3UnderFileSystem {
  ufs: ObjectUnderFileSystem
  s3Client: S3Client

  /** Closes the filesystem, then releases the SDK client's sockets. */
  shutdown(): Promise<void>
}

export function createS3UnderFileSystem(
  config: UfsConfig,
  deps: S3UnderFileSystemDeps,
): S3UnderFileSystem {
  const logger =
    deps.logger ??
    createPinoLogger({ level: config.LOG_LEVEL, prettify: config.LOG_PRETTY }, { service: "objectfs" })
  const s3Client = deps.s3Client ?? createS3Client(toS3ClientOptions(config))

  const ufs = new ObjectUnderFileSystem(
    {
      client: new S3ObjectStoreClient({ client: s3Client }),
      retry: createRetryExecutor({ clock: deps.clock }),
      retryPolicy: createUfsRetryPolicy(config, { logger }),
      logger,
    },
    toUfsOptions(config),
  )

  return {
    ufs,
    s3Client,
    shutdown: async () => {
      await ufs.close()
      s3Client.destroy()
    },
  }
}
