import { BaseError } from "@objectfs/errors"

type QueuedTask = {
  run: () => void
  reject: (err: unknown) => void
}

/**
 * Runs at most `concurrency` tasks at once; the rest wait in FIFO order.
 * `close()` rejects queued tasks and waits for the running ones.
 */
export class BoundedPool {
  private active = 0
  private closed = false
  private readonly queue: QueuedTask[] = []
  private idleWaiters: Array<() => void> = []

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be an integer >= 1 (got ${concurrency})`)
    }
  }

  get activeCount(): number {
    return this.active
  }

  get queuedCount(): number {
    return this.queue.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) return Promise.reject(poolClosed())

    return new Promise<T>((resolve, reject) => {
      const run = () => {
        this.active++

        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => this.release())
      }

      if (this.active < this.concurrency) run()
      else this.queue.push({ run, reject })
    })
  }

  async close(): Promise<void> {
    this.closed = true

    for (const queued of this.queue.splice(0)) {
      queued.reject(poolClosed())
    }

    if (this.active === 0) return
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve))
  }

  private release(): void {
    this.active--

    const next = this.queue.shift()
    if (next) {
      next.run()
      return
    }

    if (this.active === 0) {
      const waiters = this.idleWaiters
      this.idleWaiters = []
      for (const resolve of waiters) resolve()
    }
  }
}

function poolClosed(): BaseError {
  return new BaseError("Part upload pool is closed", { code: "pool_closed" })
}
