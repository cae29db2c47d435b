/**
 * Unbounded single-consumer async queue.
 *
 * Producers push without waiting; the consumer iterates with `for await`
 * and receives values in push order. Iteration ends after `close()` once
 * the buffer is drained, or throws the error passed to `fail()`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = []
  private readers: Array<{
    resolve: (result: IteratorResult<T, undefined>) => void
    reject: (error: unknown) => void
  }> = []
  private closed = false
  private failure: { error: unknown } | null = null

  get isClosed(): boolean {
    return this.closed
  }

  push(value: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel')
    }

    const reader = this.readers.shift()
    if (reader) {
      reader.resolve({ value, done: false })
    } else {
      this.buffer.push(value)
    }
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const reader of this.readers.splice(0)) {
      reader.resolve({ value: undefined, done: true })
    }
  }

  fail(error: unknown): void {
    if (this.closed) return
    this.closed = true
    this.failure = { error }
    for (const reader of this.readers.splice(0)) {
      reader.reject(error)
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1)
      return Promise.resolve({ value, done: false })
    }
    if (this.failure) {
      return Promise.reject(this.failure.error)
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject })
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.next() }
  }
}
