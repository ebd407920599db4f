import type {
  ListObjectsPage,
  ListObjectsRequest,
  ObjectMetadata,
  ObjectStoreClient,
} from "../../ports/object-store-client"
import type { ObjectListingChunk, ObjectStatus } from "../../ports/object-status"

export function toObjectStatus(meta: ObjectMetadata): ObjectStatus {
  return Object.freeze({
    key: meta.key,
    etag: meta.etag,
    sizeInBytes: meta.sizeInBytes,
    lastModifiedMs: meta.lastModifiedMs,
  })
}

/**
 * Listing page backed by a store continuation token. `next()` issues exactly
 * one request and does not retry.
 */
export class PagedListingChunk implements ObjectListingChunk {
  readonly objects: readonly ObjectStatus[]
  readonly commonPrefixes: readonly string[]
  readonly hasMore: boolean

  private readonly continuationToken: string | null

  constructor(
    private readonly client: ObjectStoreClient,
    private readonly request: Readonly<ListObjectsRequest>,
    page: ListObjectsPage,
  ) {
    this.objects = page.objects.map(toObjectStatus)
    this.commonPrefixes = [...page.commonPrefixes]
    this.continuationToken = page.nextContinuationToken
    this.hasMore = page.isTruncated && page.nextContinuationToken !== null
  }

  get isEmpty(): boolean {
    return this.objects.length === 0 && this.commonPrefixes.length === 0
  }

  async next(): Promise<ObjectListingChunk | null> {
    if (!this.hasMore || this.continuationToken === null) return null

    const request: ListObjectsRequest = {
      ...this.request,
      continuationToken: this.continuationToken,
    }
    const page = await this.client.listObjects(request)

    return new PagedListingChunk(this.client, request, page)
  }
}

/** Every object of a chunk chain, pages fetched as the iterator advances. */
export async function* iterateObjects(
  first: ObjectListingChunk | null,
): AsyncGenerator<ObjectStatus, void, undefined> {
  let chunk = first

  while (chunk) {
    yield* chunk.objects
    chunk = await chunk.next()
  }
}

/** Each chunk of a chain, starting with `first`. */
export async function* iterateChunks(
  first: ObjectListingChunk | null,
): AsyncGenerator<ObjectListingChunk, void, undefined> {
  let chunk = first

  while (chunk) {
    yield chunk
    chunk = await chunk.next()
  }
}
