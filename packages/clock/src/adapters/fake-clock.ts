import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock. `sleep()` never waits: it records the requested delay
 * and moves time forward by it.
 */
export class FakeClock implements Clock {
  readonly sleeps: Milliseconds[] = []
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    this.sleeps.push(ms)
    this.advance(Math.max(0, ms))
  }
}
