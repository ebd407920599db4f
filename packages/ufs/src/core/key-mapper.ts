import type { ObjectKey } from "../ports/object-store-client"
import type { UfsPath } from "../ports/under-file-system"

export const PATH_SEPARATOR = "/"

const URI_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/[^/]*(.*)$/i

export interface KeyMapperOptions {
  /** Mount root inside the bucket; leading and trailing "/" are ignored. */
  keyspacePrefix?: string
}

/**
 * Maps filesystem paths to object keys and back. Pure.
 *
 * Plain paths (`/a/b`, `a/b`) are relative to the keyspace prefix; full URIs
 * (`s3://bucket/pre/a/b`) address the bucket directly. The root maps to the
 * empty key, or to the keyspace prefix when one is set.
 */
export class KeyMapper {
  private readonly prefix: string

  constructor(options: KeyMapperOptions = {}) {
    this.prefix = normalize(options.keyspacePrefix ?? "")
  }

  toKey(path: UfsPath): ObjectKey {
    const uri = URI_PATTERN.exec(path)
    if (uri) return normalize(uri[1] ?? "")

    return join(this.prefix, normalize(path))
  }

  /** Key with a trailing separator; the root yields `rootKey()`. */
  toFolderKey(path: UfsPath): ObjectKey {
    return asFolder(this.toKey(path))
  }

  /** Listing prefix for the whole filesystem: "" or "prefix/". */
  rootKey(): ObjectKey {
    return asFolder(this.prefix)
  }

  /** Inverse of `toKey` for keys under the keyspace prefix; always starts with "/". */
  toPath(key: ObjectKey): UfsPath {
    const normalized = normalize(key)
    if (!this.prefix) return `${PATH_SEPARATOR}${normalized}`

    if (normalized === this.prefix) return PATH_SEPARATOR
    const folder = asFolder(this.prefix)
    if (!normalized.startsWith(folder)) {
      throw new RangeError(`Key "${key}" is outside keyspace prefix "${this.prefix}"`)
    }

    return `${PATH_SEPARATOR}${normalized.slice(folder.length)}`
  }

  isRoot(path: UfsPath): boolean {
    return this.toKey(path) === this.prefix
  }

  isRootKey(key: ObjectKey): boolean {
    return normalize(key) === this.prefix
  }

  /** Parent key without trailing separator; null for the root. */
  parentOf(key: ObjectKey): ObjectKey | null {
    const normalized = normalize(key)
    if (normalized === this.prefix) return null

    const index = normalized.lastIndexOf(PATH_SEPARATOR)
    return index < 0 ? "" : normalized.slice(0, index)
  }

  /** `key` relative to `parentKey`, without leading or trailing separator. */
  relativeName(key: ObjectKey, parentKey: ObjectKey): string {
    const folder = asFolder(normalize(parentKey))
    const normalized = normalize(key)

    if (!normalized.startsWith(folder)) {
      throw new RangeError(`Key "${key}" is not under "${parentKey}"`)
    }

    return normalized.slice(folder.length)
  }
}

export function isFolderKey(key: ObjectKey): boolean {
  return key.endsWith(PATH_SEPARATOR)
}

/** Last segment of a key, ignoring a trailing separator. */
export function baseName(key: ObjectKey): string {
  const normalized = normalize(key)
  return normalized.slice(normalized.lastIndexOf(PATH_SEPARATOR) + 1)
}

function normalize(path: string): string {
  return path.split(PATH_SEPARATOR).filter(Boolean).join(PATH_SEPARATOR)
}

function join(prefix: string, rest: string): string {
  if (!prefix) return rest
  if (!rest) return prefix

  return `${prefix}${PATH_SEPARATOR}${rest}`
}

function asFolder(key: string): string {
  return key ? `${key}${PATH_SEPARATOR}` : ""
}
