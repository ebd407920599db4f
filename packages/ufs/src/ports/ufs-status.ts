export interface ObjectPermissions {
  owner: string
  group: string
  mode: number
}

export const DEFAULT_PERMISSIONS: Readonly<ObjectPermissions> = Object.freeze({
  owner: "",
  group: "",
  mode: 0o777,
})

interface UfsStatusBase extends ObjectPermissions {
  /** Relative to the listed directory for `listStatus`, else the last path segment */
  name: string
  lastModifiedMs: number | null
}

export interface UfsFileStatus extends UfsStatusBase {
  kind: "file"
  contentLength: number
  contentHash: string | null
}

export interface UfsDirectoryStatus extends UfsStatusBase {
  kind: "directory"
}

export type UfsStatus = UfsFileStatus | UfsDirectoryStatus
