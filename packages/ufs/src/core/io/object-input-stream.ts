import { Readable } from "node:stream"
import { ObjectStoreError, ObjectStoreErrorCode } from "@objectfs/errors"
import type { ObjectKey } from "../../ports/object-store-client"
import type { ObjectInputStream, ObjectPositionReader } from "../../ports/under-file-system"
import type { RangeReader } from "./range-reader"

/**
 * Seekable stream over ranged reads. Holds at most one chunk in memory and
 * refills it on demand from the current position.
 */
export class RetryingObjectInputStream implements ObjectInputStream {
  private pos: number
  private buffer: Uint8Array = new Uint8Array(0)
  private bufferStart = 0
  private closed = false

  constructor(
    private readonly reader: RangeReader,
    readonly key: ObjectKey,
    readonly length: number,
    offset = 0,
  ) {
    if (!Number.isInteger(offset) || offset < 0 || offset > length) {
      throw new RangeError(`offset must be in [0, ${length}] (got ${offset})`)
    }

    this.pos = offset
  }

  position(): number {
    return this.pos
  }

  async read(target: Uint8Array, offset = 0, length = target.length - offset): Promise<number> {
    this.ensureOpen()
    if (length <= 0 || this.pos >= this.length) return 0

    if (!this.isBuffered(this.pos)) await this.fill()

    const from = this.pos - this.bufferStart
    const n = Math.min(length, this.buffer.length - from)

    target.set(this.buffer.subarray(from, from + n), offset)
    this.pos += n

    return n
  }

  seek(position: number): void {
    this.ensureOpen()
    if (!Number.isInteger(position) || position < 0 || position > this.length) {
      throw new RangeError(`position must be in [0, ${this.length}] (got ${position})`)
    }

    this.pos = position
  }

  skip(n: number): number {
    this.ensureOpen()
    if (n <= 0) return 0

    const skipped = Math.min(n, this.length - this.pos)
    this.pos += skipped

    return skipped
  }

  async close(): Promise<void> {
    this.closed = true
    this.buffer = new Uint8Array(0)
  }

  toReadable(): Readable {
    return Readable.from(this.chunks())
  }

  private async *chunks(): AsyncGenerator<Buffer, void, undefined> {
    const size = this.reader.options.chunkSizeBytes

    while (true) {
      const chunk = Buffer.alloc(Math.min(size, this.length - this.pos))
      if (chunk.length === 0) return

      const n = await this.read(chunk)
      if (n === 0) return

      yield chunk.subarray(0, n)
    }
  }

  private isBuffered(position: number): boolean {
    return position >= this.bufferStart && position < this.bufferStart + this.buffer.length
  }

  private async fill(): Promise<void> {
    const size = Math.min(this.reader.options.chunkSizeBytes, this.length - this.pos)
    const chunk = new Uint8Array(size)
    const n = await this.reader.read(this.key, this.pos, chunk, 0, size, this.length)

    this.buffer = chunk.subarray(0, n)
    this.bufferStart = this.pos
  }

  private ensureOpen(): void {
    if (!this.closed) return

    throw new ObjectStoreError(`Input stream for ${this.key} is closed`, {
      code: ObjectStoreErrorCode.StreamClosed,
      context: { key: this.key, operation: "read" },
    })
  }
}

export class RangePositionReader implements ObjectPositionReader {
  constructor(
    private readonly reader: RangeReader,
    readonly key: ObjectKey,
    readonly length: number,
  ) {}

  async read(
    position: number,
    buffer: Uint8Array,
    offset: number,
    length: number,
  ): Promise<number> {
    if (position < 0) throw new RangeError(`position must be >= 0 (got ${position})`)
    if (offset < 0 || length < 0 || offset + length > buffer.length) {
      throw new RangeError(`offset/length out of bounds for a buffer of ${buffer.length} bytes`)
    }

    return this.reader.read(this.key, position, buffer, offset, length, this.length)
  }
}
