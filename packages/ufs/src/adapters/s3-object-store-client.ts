import { Readable } from "node:stream"
import {
  type _Object,
  AbortMultipartUploadCommand,
  type CommonPrefix,
  CompleteMultipartUploadCommand,
  CopyObjectCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  GetObjectTaggingCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  PutObjectTaggingCommand,
  type S3Client,
  S3ServiceException,
  UploadPartCommand,
} from "@aws-sdk/client-s3"
import {
  isNotFoundError,
  isObjectStoreError,
  ObjectStoreError,
  type ObjectStoreErrorContext,
} from "@objectfs/errors"
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

const NOT_FOUND_NAMES = new Set(["NotFound", "NoSuchKey", "NoSuchUpload", "NoSuchBucket"])

const TRANSIENT_NAMES = new Set([
  "InternalError",
  "RequestTimeout",
  "RequestTimeoutException",
  "ServiceUnavailable",
  "SlowDown",
  "Throttling",
  "ThrottlingException",
  "TimeoutError",
])

const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "ETIMEDOUT",
  "EAI_AGAIN",
])

export interface S3ObjectStoreClientDeps {
  client: S3Client
}

export class S3ObjectStoreClient implements ObjectStoreClient {
  readonly type = "s3"

  constructor(readonly deps: S3ObjectStoreClientDeps) {}

  async putObject(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    body: ObjectBody,
    contentLength: number,
  ): Promise<void> {
    await this.call({ bucket, key, operation: "putObject" }, () =>
      this.deps.client.send(
        new PutObjectCommand({
          Bucket: bucket,
          Key: key,
          Body: body,
          ContentLength: contentLength,
        }),
      ),
    )
  }

  async getObjectMetadata(bucket: ObjectStoreBucket, key: ObjectKey): Promise<ObjectMetadata | null> {
    try {
      const response = await this.call({ bucket, key, operation: "getObjectMetadata" }, () =>
        this.deps.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key })),
      )

      return {
        key,
        sizeInBytes: response.ContentLength ?? 0,
        etag: response.ETag ?? null,
        lastModifiedMs: response.LastModified?.getTime() ?? null,
      }
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }
  }

  async getObjectRange(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    start: number,
    endInclusive: number,
  ): Promise<Readable> {
    const context = { bucket, key, operation: "getObjectRange" }
    const response = await this.call(context, () =>
      this.deps.client.send(
        new GetObjectCommand({
          Bucket: bucket,
          Key: key,
          Range: `bytes=${start}-${endInclusive}`,
        }),
      ),
    )

    if (response.Body instanceof Readable) return response.Body

    throw ObjectStoreError.permanent(`Unexpected body type for ${bucket}/${key}`, { context })
  }

  async deleteObject(bucket: ObjectStoreBucket, key: ObjectKey): Promise<void> {
    await this.call({ bucket, key, operation: "deleteObject" }, () =>
      this.deps.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key })),
    )
  }

  async deleteObjects(bucket: ObjectStoreBucket, keys: ObjectKey[]): Promise<ObjectKey[]> {
    if (keys.length === 0) return []

    const response = await this.call({ bucket, operation: "deleteObjects" }, () =>
      this.deps.client.send(
        new DeleteObjectsCommand({
          Bucket: bucket,
          Delete: {
            Objects: keys.map((key) => ({ Key: key })),
            Quiet: false,
          },
        }),
      ),
    )

    return (response.Deleted ?? []).flatMap((deleted) => (deleted.Key ? [deleted.Key] : []))
  }

  async listObjects(request: ListObjectsRequest): Promise<ListObjectsPage> {
    const { bucket, prefix, delimiter, maxKeys, continuationToken } = request

    const response = await this.call({ bucket, key: prefix, operation: "listObjects" }, () =>
      this.deps.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          MaxKeys: maxKeys,
          ...(prefix && { Prefix: prefix }),
          ...(delimiter && { Delimiter: delimiter }),
          ...(continuationToken && { ContinuationToken: continuationToken }),
        }),
      ),
    )

    return {
      objects: mapListContents(response.Contents),
      commonPrefixes: mapListPrefixes(response.CommonPrefixes),
      isTruncated: response.IsTruncated ?? false,
      nextContinuationToken: response.NextContinuationToken ?? null,
    }
  }

  async copyObject(
    srcBucket: ObjectStoreBucket,
    srcKey: ObjectKey,
    dstBucket: ObjectStoreBucket,
    dstKey: ObjectKey,
  ): Promise<void> {
    await this.call({ bucket: srcBucket, key: srcKey, operation: "copyObject" }, () =>
      this.deps.client.send(
        new CopyObjectCommand({
          Bucket: dstBucket,
          Key: dstKey,
          CopySource: encodeURIComponent(`${srcBucket}/${srcKey}`),
          MetadataDirective: "COPY",
        }),
      ),
    )
  }

  async getObjectTags(bucket: ObjectStoreBucket, key: ObjectKey): Promise<ObjectTag[] | null> {
    try {
      const response = await this.call({ bucket, key, operation: "getObjectTags" }, () =>
        this.deps.client.send(new GetObjectTaggingCommand({ Bucket: bucket, Key: key })),
      )

      return (response.TagSet ?? []).flatMap((tag) =>
        tag.Key !== undefined ? [{ name: tag.Key, value: tag.Value ?? "" }] : [],
      )
    } catch (err) {
      if (isNotFoundError(err)) return null
      throw err
    }
  }

  async setObjectTags(bucket: ObjectStoreBucket, key: ObjectKey, tags: ObjectTag[]): Promise<void> {
    await this.call({ bucket, key, operation: "setObjectTags" }, () =>
      this.deps.client.send(
        new PutObjectTaggingCommand({
          Bucket: bucket,
          Key: key,
          Tagging: { TagSet: tags.map((tag) => ({ Key: tag.name, Value: tag.value })) },
        }),
      ),
    )
  }

  async initiateMultipartUpload(bucket: ObjectStoreBucket, key: ObjectKey): Promise<string> {
    const context = { bucket, key, operation: "initiateMultipartUpload" }
    const response = await this.call(context, () =>
      this.deps.client.send(new CreateMultipartUploadCommand({ Bucket: bucket, Key: key })),
    )

    if (!response.UploadId) {
      throw ObjectStoreError.permanent(`No upload id returned for ${bucket}/${key}`, { context })
    }

    return response.UploadId
  }

  async uploadPart(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    partNumber: number,
    body: Buffer,
  ): Promise<string> {
    const context = { bucket, key, uploadId, partNumber, operation: "uploadPart" }
    const response = await this.call(context, () =>
      this.deps.client.send(
        new UploadPartCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          PartNumber: partNumber,
          Body: body,
          ContentLength: body.length,
        }),
      ),
    )

    if (!response.ETag) {
      throw ObjectStoreError.permanent(`No entity tag returned for part ${partNumber}`, {
        context,
      })
    }

    return response.ETag
  }

  async completeMultipartUpload(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
    parts: CompletedPart[],
  ): Promise<void> {
    await this.call({ bucket, key, uploadId, operation: "completeMultipartUpload" }, () =>
      this.deps.client.send(
        new CompleteMultipartUploadCommand({
          Bucket: bucket,
          Key: key,
          UploadId: uploadId,
          MultipartUpload: {
            Parts: parts.map((part) => ({ PartNumber: part.partNumber, ETag: part.etag })),
          },
        }),
      ),
    )
  }

  async abortMultipartUpload(
    bucket: ObjectStoreBucket,
    key: ObjectKey,
    uploadId: string,
  ): Promise<void> {
    await this.call({ bucket, key, uploadId, operation: "abortMultipartUpload" }, () =>
      this.deps.client.send(
        new AbortMultipartUploadCommand({ Bucket: bucket, Key: key, UploadId: uploadId }),
      ),
    )
  }

  private async call<T>(context: ObjectStoreErrorContext, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw toObjectStoreError(err, context)
    }
  }
}

/** Maps SDK and socket failures onto the adapter's error codes, keeping the HTTP status. */
export function toObjectStoreError(
  err: unknown,
  context: ObjectStoreErrorContext,
): ObjectStoreError {
  if (isObjectStoreError(err)) return err

  const status = err instanceof S3ServiceException ? err.$metadata.httpStatusCode : undefined
  const name = err instanceof Error ? err.name : "UnknownError"
  const message = `${context.operation ?? "request"} failed for ${context.bucket ?? ""}/${
    context.key ?? ""
  }: ${err instanceof Error ? err.message : String(err)}`
  const options = { context, cause: err, ...(status !== undefined && { status }) }

  if (NOT_FOUND_NAMES.has(name) || status === 404) {
    return ObjectStoreError.notFound(message, options)
  }

  if (isTransient(err, name, status)) return ObjectStoreError.transient(message, options)

  return ObjectStoreError.permanent(message, options)
}

function isTransient(err: unknown, name: string, status: number | undefined): boolean {
  if (status !== undefined && (status >= 500 || status === 408 || status === 429)) return true
  if (TRANSIENT_NAMES.has(name)) return true
  if (err instanceof S3ServiceException) return err.$fault === "server"

  return err instanceof Error && "code" in err && TRANSIENT_CODES.has(String(err.code))
}

function mapListContents(contents: _Object[] | undefined): ObjectMetadata[] {
  if (!contents) return []

  return contents
    .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
    .map((obj) => ({
      key: obj.Key,
      sizeInBytes: obj.Size ?? 0,
      etag: obj.ETag ?? null,
      lastModifiedMs: obj.LastModified?.getTime() ?? null,
    }))
}

function mapListPrefixes(commonPrefixes: CommonPrefix[] | undefined): string[] {
  if (!commonPrefixes) return []

  return commonPrefixes.map((p) => p.Prefix).filter((p): p is string => Boolean(p))
}
