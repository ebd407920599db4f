import type { Readable, Writable } from "node:stream"
import type { ObjectKey } from "./object-store-client"
import type { ObjectListingChunk, ObjectStatus, TagSet } from "./object-status"
import type {
  ObjectPermissions,
  UfsDirectoryStatus,
  UfsFileStatus,
  UfsStatus,
} from "./ufs-status"

/** Filesystem path: `s3://bucket/a/b` (bucket-absolute), `/a/b` or `a/b` (mount-relative). */
export type UfsPath = string

export interface ObjectInputStream {
  readonly key: ObjectKey

  /** Object size captured at open */
  readonly length: number

  position(): number

  /**
   * Reads up to `length` bytes into `buffer` at `offset`. Resolves to the
   * number of bytes read, 0 at end of object.
   */
  read(buffer: Uint8Array, offset?: number, length?: number): Promise<number>

  /** Throws RangeError outside `[0, length]`. */
  seek(position: number): void

  /** Returns how many bytes were actually skipped. */
  skip(n: number): number

  close(): Promise<void>

  /** Remaining bytes from the current position as a Node stream. */
  toReadable(): Readable
}

/** Stateless random access; safe to call concurrently. */
export interface ObjectPositionReader {
  readonly length: number

  read(position: number, buffer: Uint8Array, offset: number, length: number): Promise<number>
}

export interface ObjectOutput {
  readonly key: ObjectKey

  write(data: Uint8Array | string): Promise<void>

  /**
   * Commits the object. Later calls return the same result. After `abort()` it
   * resolves without writing; after an abort caused by a failed write it rejects.
   */
  close(): Promise<void>

  /** Discards everything written. No object is created. */
  abort(): Promise<void>

  toWritable(): Writable
}

export interface OpenOptions {
  /** @default 0 */
  offset?: number
}

export interface MkdirsOptions {
  /** @default true */
  createParent?: boolean
}

export interface DeleteDirectoryOptions {
  /** @default false */
  recursive?: boolean
}

export interface ListStatusOptions {
  /** @default false */
  recursive?: boolean
}

export interface UfsCapabilities {
  readonly permissions: boolean
  readonly multipartUpload: boolean
}

/**
 * Hierarchical filesystem view over a flat object store.
 *
 * @remarks
 * Directories exist either as zero-length folder markers (`dir/`) or
 * implicitly, through keys that live under their prefix. Renames copy then
 * delete and are not atomic.
 */
export interface UnderFileSystem {
  readonly capabilities: UfsCapabilities

  getUnderFsType(): string

  // Listing

  listChunk(key: ObjectKey, recursive: boolean): Promise<ObjectListingChunk>

  /** Null when the first page holds neither objects nor prefixes. */
  listChunkForPath(path: UfsPath, recursive: boolean): Promise<ObjectListingChunk | null>

  /** Null when `path` is not a directory. */
  listStatus(path: UfsPath, options?: ListStatusOptions): Promise<UfsStatus[] | null>

  // Status

  getObjectStatus(key: ObjectKey): Promise<ObjectStatus | null>
  getStatus(path: UfsPath): Promise<UfsStatus | null>
  getFileStatus(path: UfsPath): Promise<UfsFileStatus | null>
  getDirectoryStatus(path: UfsPath): Promise<UfsDirectoryStatus | null>

  isDirectory(path: UfsPath): Promise<boolean>
  isFile(path: UfsPath): Promise<boolean>
  exists(path: UfsPath): Promise<boolean>

  /** False when `path` is a file, or its parent is missing without `createParent`. */
  mkdirs(path: UfsPath, options?: MkdirsOptions): Promise<boolean>

  // Reads

  open(path: UfsPath, options?: OpenOptions): Promise<ObjectInputStream>
  openPositionRead(path: UfsPath, fileLength: number): ObjectPositionReader

  // Writes

  create(path: UfsPath): Promise<ObjectOutput>
  createObject(key: ObjectKey): Promise<ObjectOutput>
  createEmptyObject(key: ObjectKey): Promise<boolean>

  // Delete / copy

  deleteObject(key: ObjectKey): Promise<boolean>
  deleteObjects(keys: readonly ObjectKey[]): Promise<ObjectKey[]>
  copyObject(srcKey: ObjectKey, dstKey: ObjectKey): Promise<boolean>

  deleteFile(path: UfsPath): Promise<boolean>

  /** Like `deleteFile`, but false when nothing was there. */
  deleteExistingFile(path: UfsPath): Promise<boolean>
  deleteDirectory(path: UfsPath, options?: DeleteDirectoryOptions): Promise<boolean>
  renameFile(src: UfsPath, dst: UfsPath): Promise<boolean>
  renameDirectory(src: UfsPath, dst: UfsPath): Promise<boolean>

  // Tags

  /** Read-modify-write without compare-and-swap: concurrent writers may lose updates. */
  setObjectTag(path: UfsPath, name: string, value: string): Promise<void>
  getObjectTags(path: UfsPath): Promise<TagSet | null>

  // Permissions

  getPermissions(): ObjectPermissions
  setOwner(path: UfsPath, owner: string, group: string): Promise<void>
  setMode(path: UfsPath, mode: number): Promise<void>

  /** Releases the part upload pool. Idempotent. */
  close(): Promise<void>
}
