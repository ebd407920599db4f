import { setTimeout as delay } from "node:timers/promises"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()
    if (ms <= 0) return

    await delay(ms, undefined, signal ? { signal } : {})
  }
}
