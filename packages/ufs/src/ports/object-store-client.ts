import type { Readable } from "node:stream"

export type ObjectStoreBucket = string
export type ObjectKey = string

export type ObjectBody = Buffer | Uint8Array | Readable

export interface ObjectMetadata {
  key: ObjectKey
  sizeInBytes: number
  etag: string | null
  lastModifiedMs: number | null
}

export interface ListObjectsRequest {
  bucket: ObjectStoreBucket
  prefix: string

  /** `""` lists every key under the prefix; `"/"` groups by sub-prefix. */
  delimiter: string
  maxKeys: number

  /** Opaque token from the previous page */
  continuationToken?: string
}

export interface ListObjectsPage {
  objects: ObjectMetadata[]
  commonPrefixes: string[]
  isTruncated: boolean
  nextContinuationToken: string | null
}

export interface ObjectTag {
  name: string
  value: string
}

export interface CompletedPart {
  partNumber: number
  etag: string
}

/**
 * Raw operations of a flat bucket/key store. Keys are used as given; path
 * semantics live above this port.
 *
 * Implementations throw `ObjectStoreError` only: `object_not_found` for missing
 * objects, `transient_transport` for failures worth retrying and
 * `permanent_client` for everything else.
 */
export interface ObjectStoreClient {
  /** Short backend name, e.g. "s3" */
  readonly type: string

  putObject(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    body: ObjectBody,
    contentLength: number,
  ): Promise<void>

  /** Returns null if not found. */
  getObjectMetadata(bucket: ObjectStoreBucket, key: ObjectKey): Promise<ObjectMetadata | null>

  /** Bytes `start..endInclusive`, clipped to the object's end. */
  getObjectRange(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    start: number,
    endInclusive: number,
  ): Promise<Readable>

  /** No-op if not found. */
  deleteObject(bucket: ObjectStoreBucket, key: ObjectKey): Promise<void>

  /** Keys the store confirmed as deleted. At most 1000 keys per call. */
  deleteObjects(bucket: ObjectStoreBucket, keys: ObjectKey[]): Promise<ObjectKey[]>

  listObjects(request: ListObjectsRequest): Promise<ListObjectsPage>

  copyObject(
    srcBucket: ObjectStoreBucket,
    srcKey: ObjectKey,
    dstBucket: ObjectStoreBucket,
    dstKey: ObjectKey,
  ): Promise<void>

  /** Returns null if the object is not found. */
  getObjectTags(bucket: ObjectStoreBucket, key: ObjectKey): Promise<ObjectTag[] | null>

  /** Replaces the whole tag set. */
  setObjectTags(bucket: ObjectStoreBucket, key: ObjectKey, tags: ObjectTag[]): Promise<void>

  /** Returns the upload id. */
  initiateMultipartUpload(bucket: ObjectStoreBucket, key: ObjectKey): Promise<string>

  /** Returns the part's entity tag. */
  uploadPart(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    partNumber: number,
    body: Buffer,
  ): Promise<string>

  completeMultipartUpload(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    parts: CompletedPart[],
  ): Promise<void>

  abortMultipartUpload(bucket: ObjectStoreBucket, key: ObjectKey, uploadId: string): Promise<void>
}
