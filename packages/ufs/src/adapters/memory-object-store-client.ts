import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import type { Clock } from "@objectfs/clock"
import { ObjectStoreError } from "@objectfs/errors"
import type {
  CompletedPart,
  ListObjectsPage,
  ListObjectsRequest,
  ObjectBody,
  ObjectKey,
  ObjectMetadata,
  ObjectStoreBucket,
  ObjectStoreClient,
  ObjectTag,
} from "../ports/object-store-client"

interface StoredObject {
  data: Buffer
  etag: string
  lastModifiedMs: number
  tags: ObjectTag[]
}

interface MultipartSession {
  bucket: ObjectStoreBucket
  key: ObjectKey
  parts: Map<number, { data: Buffer; etag: string }>
}

type ListEntry = { kind: "object"; key: ObjectKey } | { kind: "prefix"; prefix: string }

export interface MemoryObjectStoreClientDeps {
  clock: Clock
}

/**
 * In-process store with S3 listing semantics: lexicographic keys, delimiter
 * grouping and opaque continuation tokens. Buckets spring into existence on
 * first write.
 */
export class MemoryObjectStoreClient implements ObjectStoreClient {
  readonly type = "memory"

  private readonly buckets = new Map<ObjectStoreBucket, Map<ObjectKey, StoredObject>>()
  private readonly uploads = new Map<string, MultipartSession>()
  private uploadCounter = 0

  constructor(private readonly deps: MemoryObjectStoreClientDeps) {}

  async putObject(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    body: ObjectBody,
    contentLength: number,
  ): Promise<void> {
    const data = await toBuffer(body)

    if (data.length !== contentLength) {
      throw ObjectStoreError.permanent(
        `Content length mismatch for ${bucket}/${key}: declared ${contentLength}, got ${data.length}`,
        { context: { bucket, key, operation: "putObject" }, status: 400 },
      )
    }

    this.store(bucket, key, data, [])
  }

  async getObjectMetadata(bucket: ObjectStoreBucket, key: ObjectKey): Promise<ObjectMetadata | null> {
    const stored = this.buckets.get(bucket)?.get(key)
    return stored ? toMetadata(key, stored) : null
  }

  async getObjectRange(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    start: number,
    endInclusive: number,
  ): Promise<Readable> {
    const stored = this.require(bucket, key, "getObjectRange")

    if (start < 0 || endInclusive < start || (start >= stored.data.length && start > 0)) {
      throw ObjectStoreError.permanent(`Invalid range ${start}-${endInclusive} for ${bucket}/${key}`, {
        context: { bucket, key, operation: "getObjectRange" },
        status: 416,
      })
    }

    return Readable.from([Buffer.from(stored.data.subarray(start, endInclusive + 1))])
  }

  async deleteObject(bucket: ObjectStoreBucket, key: ObjectKey): Promise<void> {
    this.buckets.get(bucket)?.delete(key)
  }

  async deleteObjects(bucket: ObjectStoreBucket, keys: ObjectKey[]): Promise<ObjectKey[]> {
    const objects = this.buckets.get(bucket)
    if (!objects) return []

    return keys.filter((key) => objects.delete(key))
  }

  async listObjects(request: ListObjectsRequest): Promise<ListObjectsPage> {
    const objects = this.buckets.get(request.bucket)
    const after = request.continuationToken ? decodeToken(request.continuationToken) : null
    const keys = [...(objects?.keys() ?? [])].filter((k) => k.startsWith(request.prefix)).sort()

    const page: ListEntry[] = []
    let isTruncated = false

    for (const key of keys) {
      const entry = toEntry(key, request.prefix, request.delimiter)
      const id = entryId(entry)

      if (after !== null && id <= after) continue

      const previous = page[page.length - 1]
      if (previous && entryId(previous) === id) continue

      if (page.length === request.maxKeys) {
        isTruncated = true
        break
      }
      page.push(entry)
    }

    const last = page[page.length - 1]

    return {
      objects: page.flatMap((e) => {
        const stored = e.kind === "object" ? objects?.get(e.key) : undefined
        return e.kind === "object" && stored ? [toMetadata(e.key, stored)] : []
      }),
      commonPrefixes: page.flatMap((e) => (e.kind === "prefix" ? [e.prefix] : [])),
      isTruncated,
      nextContinuationToken: isTruncated && last ? encodeToken(entryId(last)) : null,
    }
  }

  async copyObject(
    srcBucket: ObjectStoreBucket,
    srcKey: ObjectKey,
    dstBucket: ObjectStoreBucket,
    dstKey: ObjectKey,
  ): Promise<void> {
    const src = this.require(srcBucket, srcKey, "copyObject")
    this.store(dstBucket, dstKey, Buffer.from(src.data), src.tags.map((t) => ({ ...t })))
  }

  async getObjectTags(bucket: ObjectStoreBucket, key: ObjectKey): Promise<ObjectTag[] | null> {
    const stored = this.buckets.get(bucket)?.get(key)
    return stored ? stored.tags.map((t) => ({ ...t })) : null
  }

  async setObjectTags(bucket: ObjectStoreBucket, key: ObjectKey, tags: ObjectTag[]): Promise<void> {
    const stored = this.require(bucket, key, "setObjectTags")
    stored.tags = tags.map((t) => ({ ...t }))
  }

  async initiateMultipartUpload(bucket: ObjectStoreBucket, key: ObjectKey): Promise<string> {
    const uploadId = `upload-${++this.uploadCounter}`
    this.uploads.set(uploadId, { bucket, key, parts: new Map() })

    return uploadId
  }

  async uploadPart(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    partNumber: number,
    body: Buffer,
  ): Promise<string> {
    const session = this.session(bucket, key, uploadId, "uploadPart")
    const data = Buffer.from(body)
    const etag = md5Etag(data)

    session.parts.set(partNumber, { data, etag })
    return etag
  }

  async completeMultipartUpload(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    parts: CompletedPart[],
  ): Promise<void> {
    const session = this.session(bucket, key, uploadId, "completeMultipartUpload")
    const buffers: Buffer[] = []
    let previous = 0

    for (const { partNumber, etag } of parts) {
      const part = session.parts.get(partNumber)

      if (partNumber <= previous || !part || part.etag !== etag) {
        throw ObjectStoreError.permanent(`Invalid part list for upload ${uploadId}`, {
          context: { bucket, key, uploadId, partNumber, operation: "completeMultipartUpload" },
          status: 400,
        })
      }

      buffers.push(part.data)
      previous = partNumber
    }

    this.uploads.delete(uploadId)
    this.store(bucket, key, Buffer.concat(buffers), [])
  }

  async abortMultipartUpload(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
  ): Promise<void> {
    this.session(bucket, key, uploadId, "abortMultipartUpload")
    this.uploads.delete(uploadId)
  }

  /** Upload ids of sessions neither completed nor aborted. */
  openUploads(): string[] {
    return [...this.uploads.keys()]
  }

  private store(bucket: ObjectStoreBucket, key: ObjectKey, data: Buffer, tags: ObjectTag[]): void {
    let objects = this.buckets.get(bucket)
    if (!objects) {
      objects = new Map()
      this.buckets.set(bucket, objects)
    }

    objects.set(key, {
      data,
      etag: md5Etag(data),
      lastModifiedMs: this.deps.clock.nowMs(),
      tags,
    })
  }

  private require(bucket: ObjectStoreBucket, key: ObjectKey, operation: string): StoredObject {
    const stored = this.buckets.get(bucket)?.get(key)
    if (stored) return stored

    throw ObjectStoreError.notFound(`Object not found: ${bucket}/${key}`, {
      context: { bucket, key, operation },
      status: 404,
    })
  }

  private session(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    operation: string,
  ): MultipartSession {
    const session = this.uploads.get(uploadId)
    if (session && session.bucket === bucket && session.key === key) return session

    throw ObjectStoreError.notFound(`No such upload: ${uploadId}`, {
      context: { bucket, key, uploadId, operation },
      status: 404,
    })
  }
}

function toMetadata(key: ObjectKey, stored: StoredObject): ObjectMetadata {
  return {
    key,
    sizeInBytes: stored.data.length,
    etag: stored.etag,
    lastModifiedMs: stored.lastModifiedMs,
  }
}

function toEntry(key: ObjectKey, prefix: string, delimiter: string): ListEntry {
  if (!delimiter) return { kind: "object", key }

  const index = key.indexOf(delimiter, prefix.length)
  if (index < 0) return { kind: "object", key }

  return { kind: "prefix", prefix: key.slice(0, index + delimiter.length) }
}

function entryId(entry: ListEntry): string {
  return entry.kind === "object" ? entry.key : entry.prefix
}

function encodeToken(id: string): string {
  return Buffer.from(id, "utf-8").toString("base64url")
}

function decodeToken(token: string): string {
  return Buffer.from(token, "base64url").toString("utf-8")
}

function md5Etag(data: Buffer): string {
  return `"${createHash("md5").update(data).digest("hex")}"`
}

async function toBuffer(body: ObjectBody): Promise<Buffer> {
  if (Buffer.isBuffer(body)) return Buffer.from(body)
  if (body instanceof Uint8Array) return Buffer.from(body)

  const chunks: Buffer[] = []
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
  }

  return Buffer.concat(chunks)
}
