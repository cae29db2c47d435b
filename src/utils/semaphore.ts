import { ScanAbortedError } from './errors.js'

interface Waiter {
  resolve: () => void
  reject: (error: Error) => void
  signal?: AbortSignal
  onAbort?: () => void
}

/**
 * Counting semaphore used to admit connect probes.
 *
 * A session creates its own by default; passing one instance to several
 * sessions makes them share a single in-flight budget.
 */
export class Semaphore {
  private readonly capacity: number
  private active = 0
  private waiters: Waiter[] = []

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  get size(): number {
    return this.capacity
  }

  get inUse(): number {
    return this.active
  }

  get available(): number {
    return this.capacity - this.active
  }

  get pending(): number {
    return this.waiters.length
  }

  /**
   * Wait for a free slot. Rejects with ScanAbortedError if `signal` aborts first.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new ScanAbortedError())
    }

    if (this.active < this.capacity && this.waiters.length === 0) {
      this.active++
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal }
      if (signal) {
        waiter.onAbort = () => {
          this.waiters = this.waiters.filter(w => w !== waiter)
          reject(new ScanAbortedError())
        }
        signal.addEventListener('abort', waiter.onAbort, { once: true })
      }
      this.waiters.push(waiter)
    })
  }

  /**
   * Free a slot, handing it straight to the oldest waiter if there is one
   */
  release(): void {
    if (this.active === 0) {
      throw new Error('Semaphore released more times than acquired')
    }

    const next = this.waiters.shift()
    if (!next) {
      this.active--
      return
    }

    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort)
    }
    next.resolve()
  }
}
