import fs from "node:fs/promises"
import { BaseError, isNotFoundError, ObjectStoreError } from "@objectfs/errors"
import type { Logger } from "@objectfs/logger"
import type { ListObjectsRequest, ObjectKey } from "../ports/object-store-client"
import type { ObjectStatus, TagSet } from "../ports/object-status"
import type {
  DeleteDirectoryOptions,
  ListStatusOptions,
  MkdirsOptions,
  ObjectInputStream,
  ObjectOutput,
  ObjectPositionReader,
  OpenOptions,
  UfsCapabilities,
  UfsPath,
  UnderFileSystem,
} from "../ports/under-file-system"
import {
  type ResolvedUfsOptions,
  resolveUfsOptions,
  type UfsDeps,
  type UfsOptions,
} from "../ports/ufs-options"
import {
  DEFAULT_PERMISSIONS,
  type ObjectPermissions,
  type UfsDirectoryStatus,
  type UfsFileStatus,
  type UfsStatus,
} from "../ports/ufs-status"
import { BoundedPool } from "./concurrency/bounded-pool"
import type { ObjectOutputDeps } from "./io/base-object-output"
import { MultipartOutputStream } from "./io/multipart-output-stream"
import { RangePositionReader, RetryingObjectInputStream } from "./io/object-input-stream"
import { ObjectOutputStream } from "./io/object-output-stream"
import { RangeReader } from "./io/range-reader"
import { baseName, KeyMapper, PATH_SEPARATOR } from "./key-mapper"
import {
  iterateChunks,
  iterateObjects,
  PagedListingChunk,
  toObjectStatus,
} from "./listing/object-listing-chunk"
import { mergeTag, toTagSet } from "./tags/merge-tag"

/**
 * Filesystem view over any `ObjectStoreClient`.
 *
 * Every call maps its path to a key, then goes to the store through the
 * injected retry executor. Listing continuation (`chunk.next()`) is the only
 * store call made without retries.
 */
export class ObjectUnderFileSystem implements UnderFileSystem {
  readonly options: ResolvedUfsOptions
  readonly keys: KeyMapper
  readonly capabilities: UfsCapabilities

  private readonly logger: Logger
  private readonly reader: RangeReader
  private pool: BoundedPool | null = null
  private tmpDirCursor = 0
  private closed = false

  constructor(
    readonly deps: UfsDeps,
    options: UfsOptions,
  ) {
    this.options = resolveUfsOptions(options)
    this.keys = new KeyMapper({ keyspacePrefix: this.options.keyspacePrefix })
    this.capabilities = Object.freeze({
      permissions: false,
      multipartUpload: this.options.multipartUploadEnabled,
    })
    this.logger = deps.logger.child({ module: "ufs", bucket: this.options.bucket })
    this.reader = new RangeReader(deps, {
      bucket: this.options.bucket,
      chunkSizeBytes: this.options.readChunkSizeBytes,
    })
  }

  getUnderFsType(): string {
    return this.deps.client.type
  }

  // Listing

  async listChunk(key: ObjectKey, recursive: boolean): Promise<PagedListingChunk> {
    const { client } = this.deps
    const request: ListObjectsRequest = {
      bucket: this.options.bucket,
      prefix: normalizePrefix(key),
      delimiter: recursive ? "" : PATH_SEPARATOR,
      maxKeys: this.options.listingPageSize,
    }

    const page = await this.run(() => client.listObjects(request))
    return new PagedListingChunk(client, request, page)
  }

  async listChunkForPath(path: UfsPath, recursive: boolean): Promise<PagedListingChunk | null> {
    const chunk = await this.listChunk(this.keys.toFolderKey(path), recursive)
    return chunk.isEmpty ? null : chunk
  }

  async listStatus(path: UfsPath, options: ListStatusOptions = {}): Promise<UfsStatus[] | null> {
    const key = this.keys.toKey(path)
    const folder = folderOf(key)
    const recursive = options.recursive ?? false

    const first = await this.listChunk(folder, recursive)
    if (first.isEmpty && !this.keys.isRootKey(key)) return null

    const statuses: UfsStatus[] = []
    const directories = new Map<string, UfsDirectoryStatus>()

    const addDirectory = (name: string, lastModifiedMs: number | null) => {
      const existing = directories.get(name)
      if (existing) {
        if (existing.lastModifiedMs === null) existing.lastModifiedMs = lastModifiedMs
        return
      }

      const status = toDirectoryStatus(name, lastModifiedMs)
      directories.set(name, status)
      statuses.push(status)
    }

    for await (const chunk of iterateChunks(first)) {
      for (const object of chunk.objects) {
        if (object.key === folder) continue

        const name = object.key.slice(folder.length)
        if (recursive) {
          for (const ancestor of ancestorsOf(name)) addDirectory(ancestor, null)
        }

        if (name.endsWith(PATH_SEPARATOR)) addDirectory(name.slice(0, -1), object.lastModifiedMs)
        else statuses.push(toFileStatus(name, object))
      }

      for (const prefix of chunk.commonPrefixes) {
        addDirectory(prefix.slice(folder.length, -1), null)
      }
    }

    return statuses
  }

  // Status

  async getObjectStatus(key: ObjectKey): Promise<ObjectStatus | null> {
    const { client } = this.deps

    try {
      const meta = await this.run(() => client.getObjectMetadata(this.options.bucket, key))
      return meta ? toObjectStatus(meta) : null
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }
  }

  async getStatus(path: UfsPath): Promise<UfsStatus | null> {
    return (await this.getFileStatus(path)) ?? (await this.getDirectoryStatus(path))
  }

  async getFileStatus(path: UfsPath): Promise<UfsFileStatus | null> {
    const key = this.keys.toKey(path)
    if (this.keys.isRootKey(key)) return null

    const status = await this.getObjectStatus(key)
    return status ? toFileStatus(baseName(key), status) : null
  }

  async getDirectoryStatus(path: UfsPath): Promise<UfsDirectoryStatus | null> {
    const key = this.keys.toKey(path)
    if (this.keys.isRootKey(key)) return toDirectoryStatus("", null)

    const marker = await this.getObjectStatus(folderOf(key))
    if (marker) return toDirectoryStatus(baseName(key), marker.lastModifiedMs)

    const chunk = await this.listChunk(folderOf(key), true)
    return chunk.isEmpty ? null : toDirectoryStatus(baseName(key), null)
  }

  isDirectory(path: UfsPath): Promise<boolean> {
    return this.isDirectoryKey(this.keys.toKey(path))
  }

  isFile(path: UfsPath): Promise<boolean> {
    return this.isFileKey(this.keys.toKey(path))
  }

  async exists(path: UfsPath): Promise<boolean> {
    return (await this.isFile(path)) || (await this.isDirectory(path))
  }

  mkdirs(path: UfsPath, options: MkdirsOptions = {}): Promise<boolean> {
    return this.mkdirsKey(this.keys.toKey(path), options.createParent ?? true)
  }

  // Reads

  async open(path: UfsPath, options: OpenOptions = {}): Promise<ObjectInputStream> {
    const key = this.keys.toKey(path)
    const status = await this.getObjectStatus(key)

    if (!status) {
      throw ObjectStoreError.notFound(`No such file: ${path}`, {
        context: { bucket: this.options.bucket, key, operation: "open" },
      })
    }

    return new RetryingObjectInputStream(this.reader, key, status.sizeInBytes, options.offset ?? 0)
  }

  openPositionRead(path: UfsPath, fileLength: number): ObjectPositionReader {
    return new RangePositionReader(this.reader, this.keys.toKey(path), fileLength)
  }

  // Writes

  create(path: UfsPath): Promise<ObjectOutput> {
    return this.createObject(this.keys.toKey(path))
  }

  async createObject(key: ObjectKey): Promise<ObjectOutput> {
    this.ensureOpen()

    const { bucket } = this.options
    const deps: ObjectOutputDeps = { ...this.deps, logger: this.logger }

    if (this.options.multipartUploadEnabled) {
      return new MultipartOutputStream(
        { ...deps, pool: () => this.partPool() },
        { bucket, key, partSizeBytes: this.options.multipartPartSizeBytes },
      )
    }

    const tmpDir = this.nextTmpDir()
    if (tmpDir) await fs.mkdir(tmpDir, { recursive: true })

    return new ObjectOutputStream(deps, { bucket, key, ...(tmpDir !== undefined && { tmpDir }) })
  }

  async createEmptyObject(key: ObjectKey): Promise<boolean> {
    const { client } = this.deps

    try {
      await this.run(() => client.putObject(this.options.bucket, key, Buffer.alloc(0), 0))
      return true
    } catch (err) {
      this.logger.error("failed to create empty object", { key, err })
      return false
    }
  }

  // Delete / copy

  async deleteObject(key: ObjectKey): Promise<boolean> {
    const { client } = this.deps

    try {
      await this.run(() => client.deleteObject(this.options.bucket, key))
      return true
    } catch (err) {
      this.logger.error("failed to delete object", { key, err })
      return false
    }
  }

  async deleteObjects(keys: readonly ObjectKey[]): Promise<ObjectKey[]> {
    const { client } = this.deps
    const { bucket, deleteBatchSize } = this.options
    const deleted: ObjectKey[] = []

    for (const batch of batches(keys, deleteBatchSize)) {
      const confirmed = await this.run(() => client.deleteObjects(bucket, batch))

      if (confirmed.length < batch.length) {
        this.logger.warn("batch delete partially failed", {
          requested: batch.length,
          deleted: confirmed.length,
        })
      }
      deleted.push(...confirmed)
    }

    return deleted
  }

  async copyObject(srcKey: ObjectKey, dstKey: ObjectKey): Promise<boolean> {
    const { client } = this.deps
    const { bucket } = this.options

    try {
      await this.run(() => client.copyObject(bucket, srcKey, bucket, dstKey))
      this.logger.debug("object copied", { key: srcKey, dstKey })
      return true
    } catch (err) {
      this.logger.error("failed to copy object", { key: srcKey, dstKey, err })
      return false
    }
  }

  deleteFile(path: UfsPath): Promise<boolean> {
    return this.deleteObject(this.keys.toKey(path))
  }

  async deleteExistingFile(path: UfsPath): Promise<boolean> {
    if (!(await this.isFile(path))) return false
    return this.deleteFile(path)
  }

  async deleteDirectory(path: UfsPath, options: DeleteDirectoryOptions = {}): Promise<boolean> {
    const key = this.keys.toKey(path)
    if (!(await this.isDirectoryKey(key))) return false

    const folder = folderOf(key)

    if (!options.recursive) {
      const listing = await this.listChunk(folder, false)
      const hasChildren =
        listing.commonPrefixes.length > 0 || listing.objects.some((o) => o.key !== folder)

      if (hasChildren) return false
      return this.keys.isRootKey(key) || this.deleteObject(folder)
    }

    const members: ObjectKey[] = []
    for await (const object of iterateObjects(await this.listChunk(folder, true))) {
      members.push(object.key)
    }

    const deleted = await this.deleteObjects(members)
    return deleted.length === members.length
  }

  async renameFile(src: UfsPath, dst: UfsPath): Promise<boolean> {
    const srcKey = this.keys.toKey(src)
    if (!(await this.copyObject(srcKey, this.keys.toKey(dst)))) return false

    return this.deleteObject(srcKey)
  }

  async renameDirectory(src: UfsPath, dst: UfsPath): Promise<boolean> {
    const srcKey = this.keys.toKey(src)
    const dstKey = this.keys.toKey(dst)
    const srcFolder = folderOf(srcKey)
    const dstFolder = folderOf(dstKey)

    if (this.keys.isRootKey(srcKey) || dstFolder.startsWith(srcFolder)) return false
    if (!(await this.isDirectoryKey(srcKey))) return false

    const members: ObjectKey[] = []
    for await (const object of iterateObjects(await this.listChunk(srcFolder, true))) {
      const target = dstFolder + object.key.slice(srcFolder.length)
      if (!(await this.copyObject(object.key, target))) return false

      members.push(object.key)
    }

    const deleted = await this.deleteObjects(members)
    return deleted.length === members.length
  }

  // Tags

  async setObjectTag(path: UfsPath, name: string, value: string): Promise<void> {
    const { client } = this.deps
    const { bucket } = this.options
    const key = this.keys.toKey(path)

    const current = await this.run(() => client.getObjectTags(bucket, key))
    if (current === null) {
      throw ObjectStoreError.notFound(`No such file: ${path}`, {
        context: { bucket, key, operation: "setObjectTag" },
      })
    }

    // No compare-and-swap: a concurrent writer's update between the read above
    // and this write is lost.
    const merged = mergeTag(current, name, value)
    await this.run(() => client.setObjectTags(bucket, key, merged))
  }

  async getObjectTags(path: UfsPath): Promise<TagSet | null> {
    const { client } = this.deps
    const key = this.keys.toKey(path)

    try {
      const tags = await this.run(() => client.getObjectTags(this.options.bucket, key))
      return tags ? toTagSet(tags) : null
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }
  }

  // Permissions

  getPermissions(): ObjectPermissions {
    return { ...DEFAULT_PERMISSIONS }
  }

  async setOwner(_path: UfsPath, _owner: string, _group: string): Promise<void> {}

  async setMode(_path: UfsPath, _mode: number): Promise<void> {}

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    await this.pool?.close()
  }

  private run<T>(fn: () => Promise<T>): Promise<T> {
    return this.deps.retry.execute(fn, this.deps.retryPolicy)
  }

  private async isDirectoryKey(key: ObjectKey): Promise<boolean> {
    if (this.keys.isRootKey(key)) return true
    if (await this.getObjectStatus(folderOf(key))) return true

    return !(await this.listChunk(folderOf(key), true)).isEmpty
  }

  private async isFileKey(key: ObjectKey): Promise<boolean> {
    if (this.keys.isRootKey(key)) return false
    return (await this.getObjectStatus(key)) !== null
  }

  private async mkdirsKey(key: ObjectKey, createParent: boolean): Promise<boolean> {
    if (await this.isDirectoryKey(key)) return true
    if (await this.isFileKey(key)) {
      this.logger.debug("cannot create directory over a file", { key })
      return false
    }

    const parent = this.keys.parentOf(key)
    if (parent !== null && !(await this.isDirectoryKey(parent))) {
      if (!createParent) return false
      if (!(await this.mkdirsKey(parent, true))) return false
    }

    const created = await this.createEmptyObject(folderOf(key))
    if (created) this.logger.debug("folder created", { key: folderOf(key) })

    return created
  }

  private partPool(): BoundedPool {
    this.ensureOpen()

    this.pool ??= new BoundedPool(this.options.multipartUploadThreads)
    return this.pool
  }

  private nextTmpDir(): string | undefined {
    const { tmpDirs } = this.options
    if (tmpDirs.length === 0) return undefined

    return tmpDirs[this.tmpDirCursor++ % tmpDirs.length]
  }

  private ensureOpen(): void {
    if (!this.closed) return
    throw new BaseError("Under file system is closed", { code: "ufs_closed" })
  }
}

function folderOf(key: ObjectKey): ObjectKey {
  return key ? `${key}${PATH_SEPARATOR}` : ""
}

function normalizePrefix(key: ObjectKey): string {
  const collapsed = key.replace(/\/{2,}/g, PATH_SEPARATOR)
  return collapsed.startsWith(PATH_SEPARATOR) ? collapsed.slice(1) : collapsed
}

/** "a/b/c.txt" -> ["a", "a/b"] */
function ancestorsOf(name: string): string[] {
  const segments = name.split(PATH_SEPARATOR).slice(0, -1).filter(Boolean)
  return segments.map((_, i) => segments.slice(0, i + 1).join(PATH_SEPARATOR))
}

function batches<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size))
  }
  return result
}

function toFileStatus(name: string, status: ObjectStatus): UfsFileStatus {
  return {
    kind: "file",
    name,
    contentLength: status.sizeInBytes,
    contentHash: status.etag,
    lastModifiedMs: status.lastModifiedMs,
    ...DEFAULT_PERMISSIONS,
  }
}

function toDirectoryStatus(name: string, lastModifiedMs: number | null): UfsDirectoryStatus {
  return { kind: "directory", name, lastModifiedMs, ...DEFAULT_PERMISSIONS }
}
