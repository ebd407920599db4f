import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ObjectStoreError } from "@objectfs/errors"
import { createNullLogger } from "@objectfs/logger"
import { vi } from "vitest"
import {
  createUfsRetryPolicy,
  loadUfsConfig,
  toS3ClientOptions,
  toUfsOptions,
  type UfsConfig,
} from "../ufs-config"

const load = (env: Record<string, string>) => loadUfsConfig({ env })

describe("loadUfsConfig", () => {
  it("applies defaults around the required bucket", async () => {
    const config = await load({ OBJECTFS_BUCKET: "data" })

    expect(config.value).toMatchObject({
      BUCKET: "data",
      REGION: "us-east-1",
      KEYSPACE_PREFIX: "",
      MULTIPART_UPLOAD_ENABLED: false,
      MULTIPART_UPLOAD_THREADS: 20,
      MULTIPART_PART_SIZE_BYTES: 64 * 1024 * 1024,
      READ_CHUNK_SIZE_BYTES: 8 * 1024 * 1024,
      LISTING_PAGE_SIZE: 1000,
      DELETE_BATCH_SIZE: 1000,
      TMP_DIRS: [],
      RETRY_MAX_ATTEMPTS: 3,
      LOG_LEVEL: "info",
      LOG_PRETTY: false,
    })
    expect(config.value.ENDPOINT).toBeUndefined()
    expect(config.explain("BUCKET")).toBe("env")
    expect(config.explain("REGION")).toBe("default")
  })

  it("coerces prefixed environment strings", async () => {
    const config = await load({
      OBJECTFS_BUCKET: "data",
      OBJECTFS_MULTIPART_UPLOAD_ENABLED: "true",
      OBJECTFS_LISTING_PAGE_SIZE: "250",
      OBJECTFS_TMP_DIRS: " /tmp/a , /tmp/b ,",
      OBJECTFS_ENDPOINT: "http://localhost:9000",
      UNRELATED: "ignored",
    })

    expect(config.get("MULTIPART_UPLOAD_ENABLED")).toBe(true)
    expect(config.get("LISTING_PAGE_SIZE")).toBe(250)
    expect(config.get("TMP_DIRS")).toEqual(["/tmp/a", "/tmp/b"])
    expect(config.get("ENDPOINT")).toBe("http://localhost:9000")
    expect(config.unknownKeys()).toEqual([])
  })

  it("rejects a listing page size above the store limit", async () => {
    await expect(
      load({ OBJECTFS_BUCKET: "data", OBJECTFS_LISTING_PAGE_SIZE: "5000" }),
    ).rejects.toMatchObject({ code: "config_invalid" })
  })

  it("rejects a missing bucket", async () => {
    await expect(load({})).rejects.toMatchObject({ code: "config_invalid" })
  })

  it("lets overrides win over the environment", async () => {
    const config = await loadUfsConfig({
      env: { OBJECTFS_BUCKET: "data", OBJECTFS_REGION: "eu-west-1" },
      overrides: { REGION: "eu-north-1" },
    })

    expect(config.get("REGION")).toBe("eu-north-1")
    expect(config.explain("REGION")).toBe("object:overrides")
  })

  it("reads a .env file before the environment", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "objectfs-config-"))
    const file = path.join(dir, ".env")
    await fs.writeFile(file, "OBJECTFS_BUCKET=from-file\nOBJECTFS_REGION=ap-south-1\n")

    try {
      const config = await loadUfsConfig({
        env: { OBJECTFS_REGION: "eu-central-1" },
        dotenvFile: file,
      })

      expect(config.get("BUCKET")).toBe("from-file")
      expect(config.get("REGION")).toBe("eu-central-1")
      expect(config.explain("BUCKET")).toBe(`dotenv:${file}`)
    } finally {
      await fs.rm(dir, { recursive: true, force: true })
    }
  })
})

describe("config mapping", () => {
  let config: UfsConfig

  beforeEach(async () => {
    config = (
      await load({
        OBJECTFS_BUCKET: "data",
        OBJECTFS_KEYSPACE_PREFIX: "tenants/7",
        OBJECTFS_DELETE_BATCH_SIZE: "10",
        OBJECTFS_MAX_CONNECTIONS: "64",
      })
    ).value
  })

  it("maps to filesystem options", () => {
    expect(toUfsOptions(config)).toEqual({
      bucket: "data",
      keyspacePrefix: "tenants/7",
      multipartUploadEnabled: false,
      multipartUploadThreads: 20,
      multipartPartSizeBytes: 64 * 1024 * 1024,
      readChunkSizeBytes: 8 * 1024 * 1024,
      listingPageSize: 1000,
      deleteBatchSize: 10,
      tmpDirs: [],
    })
  })

  it("maps to S3 client options without an endpoint when none is set", () => {
    expect(toS3ClientOptions(config)).toEqual({
      region: "us-east-1",
      forcePathStyle: false,
      connectionTimeoutMs: 50_000,
      socketTimeoutMs: 50_000,
      maxConnections: 64,
    })
  })
})

describe("createUfsRetryPolicy", () => {
  let config: UfsConfig

  beforeEach(async () => {
    config = (await load({ OBJECTFS_BUCKET: "data" })).value
  })

  it("retries only retryable errors", () => {
    const policy = createUfsRetryPolicy(config, { logger: createNullLogger() })
    const ctx = { attempt: 0, startedAt: 0, elapsedMs: 0 }

    expect(policy.maxAttempts).toBe(3)
    expect(policy.shouldRetry?.(ObjectStoreError.transient("slow down"), ctx)).toBe(true)
    expect(policy.shouldRetry?.(ObjectStoreError.permanent("denied"), ctx)).toBe(false)
    expect(policy.shouldRetry?.(new Error("plain"), ctx)).toBe(false)
  })

  it("backs off exponentially with full jitter up to the max delay", () => {
    const policy = createUfsRetryPolicy(config, {
      logger: createNullLogger(),
      random: { next: () => 0.5 },
    })

    expect(policy.delay.delayFor(0)).toBe(50)
    expect(policy.delay.delayFor(3)).toBe(400)
    expect(policy.delay.delayFor(10)).toBe(5000)
  })

  it("logs each retry at debug", () => {
    const logger = createNullLogger()
    const debug = vi.spyOn(logger, "debug")
    const policy = createUfsRetryPolicy(config, { logger })
    const err = ObjectStoreError.transient("reset")

    policy.observer?.onRetry?.(err, { attempt: 0, startedAt: 0, elapsedMs: 5, nextDelayMs: 50 })

    expect(debug).toHaveBeenCalledWith("retrying store call", {
      attempt: 1,
      nextDelayMs: 50,
      err,
    })
  })
})
