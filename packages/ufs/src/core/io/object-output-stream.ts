import { randomUUID } from "node:crypto"
import { createReadStream } from "node:fs"
import fs, { type FileHandle } from "node:fs/promises"
import path from "node:path"
import type { ObjectBody, ObjectKey, ObjectStoreBucket } from "../../ports/object-store-client"
import { BaseObjectOutput, type ObjectOutputDeps } from "./base-object-output"

export interface ObjectOutputStreamOptions {
  bucket: ObjectStoreBucket
  key: ObjectKey

  /** Spill directory; bytes stay in memory when unset. */
  tmpDir?: string
}

/**
 * Single-shot sink: buffers everything, then issues one PUT with a known
 * content length on `close()`. The store ends up with the whole object or none.
 */
export class ObjectOutputStream extends BaseObjectOutput {
  private readonly chunks: Uint8Array[] = []
  private size = 0

  private spillPath: string | null = null
  private spill: FileHandle | null = null

  constructor(
    deps: ObjectOutputDeps,
    readonly options: ObjectOutputStreamOptions,
  ) {
    super(deps, options.bucket, options.key)
  }

  /** Spill file in use, if any. Removed once the stream is closed or aborted. */
  get spillFile(): string | null {
    return this.spillPath
  }

  protected async append(bytes: Uint8Array): Promise<void> {
    const { tmpDir } = this.options

    if (tmpDir) {
      if (!this.spill) {
        this.spillPath = path.join(tmpDir, `objectfs-${randomUUID()}.tmp`)
        this.spill = await fs.open(this.spillPath, "w")
      }
      await this.spill.write(bytes)
    } else {
      this.chunks.push(Uint8Array.from(bytes))
    }

    this.size += bytes.length
  }

  protected async commit(): Promise<void> {
    const { client } = this.deps
    const { bucket, key } = this

    try {
      await this.spill?.close()
      this.spill = null

      await this.deps.retry.execute(
        () => client.putObject(bucket, key, this.body(), this.size),
        this.deps.retryPolicy,
      )
    } catch (err) {
      throw this.writeFailed(`Failed to write ${bucket}/${key}`, err, { operation: "putObject" })
    } finally {
      await this.cleanup()
    }
  }

  protected async discard(): Promise<void> {
    await this.cleanup()
  }

  /** Fresh body per attempt, so a retried PUT resends from the start. */
  private body(): ObjectBody {
    if (this.spillPath) return createReadStream(this.spillPath)

    return Buffer.concat(this.chunks, this.size)
  }

  private async cleanup(): Promise<void> {
    this.chunks.length = 0

    await this.spill?.close()
    this.spill = null

    if (this.spillPath) await fs.rm(this.spillPath, { force: true })
  }
}
