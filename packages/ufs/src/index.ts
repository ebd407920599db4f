export {
  type CreateMemoryObjectStoreClientOptions,
  type CreateS3ClientOptions,
  type CreateS3ObjectStoreClientOptions,
  type CreateUnderFileSystemOptions,
  createMemoryObjectStoreClient,
  createS3Client,
  createS3ObjectStoreClient,
  createUnderFileSystem,
} from "./adapters/create"
export {
  MemoryObjectStoreClient,
  type MemoryObjectStoreClientDeps,
} from "./adapters/memory-object-store-client"
export {
  S3ObjectStoreClient,
  type S3ObjectStoreClientDeps,
  toObjectStoreError,
} from "./adapters/s3-object-store-client"
export {
  createS3UnderFileSystem,
  type S3UnderFileSystem,
  type S3UnderFileSystemDeps,
} from "./config/create-from-config"
export {
  createUfsRetryPolicy,
  type LoadUfsConfigOptions,
  loadUfsConfig,
  toS3ClientOptions,
  toUfsOptions,
  UFS_ENV_PREFIX,
  type UfsConfig,
  type UfsRetryPolicyDeps,
  ufsConfigSchema,
} from "./config/ufs-config"
export { BoundedPool } from "./core/concurrency/bounded-pool"
export { MultipartOutputStream } from "./core/io/multipart-output-stream"
export { RangePositionReader, RetryingObjectInputStream } from "./core/io/object-input-stream"
export { ObjectOutputStream } from "./core/io/object-output-stream"
export { RangeReader } from "./core/io/range-reader"
export { baseName, isFolderKey, KeyMapper, type KeyMapperOptions, PATH_SEPARATOR } from "./core/key-mapper"
export {
  iterateChunks,
  iterateObjects,
  PagedListingChunk,
} from "./core/listing/object-listing-chunk"
export { ObjectUnderFileSystem } from "./core/object-under-file-system"
export { mergeTag, toTagSet } from "./core/tags/merge-tag"
export type {
  CompletedPart,
  ListObjectsPage,
  ListObjectsRequest,
  ObjectBody,
  ObjectKey,
  ObjectMetadata,
  ObjectStoreBucket,
  ObjectStoreClient,
  ObjectTag,
} from "./ports/object-store-client"
export type { ObjectListingChunk, ObjectStatus, TagSet } from "./ports/object-status"
export {
  DEFAULT_UFS_OPTIONS,
  MAX_STORE_BATCH_SIZE,
  type ResolvedUfsOptions,
  resolveUfsOptions,
  type UfsDeps,
  type UfsOptions,
} from "./ports/ufs-options"
export {
  DEFAULT_PERMISSIONS,
  type ObjectPermissions,
  type UfsDirectoryStatus,
  type UfsFileStatus,
  type UfsStatus,
} from "./ports/ufs-status"
export type {
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
} from "./ports/under-file-system"
