import type { ObjectKey } from "./object-store-client"

export interface ObjectStatus {
  readonly key: ObjectKey
  readonly etag: string | null
  readonly sizeInBytes: number
  readonly lastModifiedMs: number | null
}

/**
 * One page of a listing. Forward-only: a chain cannot be restarted from the
 * middle, only from a fresh `listChunk()`.
 */
export interface ObjectListingChunk {
  readonly objects: readonly ObjectStatus[]

  /** Sub-prefixes, each ending in "/"; empty for recursive listings */
  readonly commonPrefixes: readonly string[]
  readonly hasMore: boolean

  /** Resolves to null when `hasMore` is false. Not retried. */
  next(): Promise<ObjectListingChunk | null>
}

export type TagSet = Readonly<Record<string, string>>
