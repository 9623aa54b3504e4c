interface ChannelOptions {
  /** Drop a value that is already waiting in the buffer. */
  coalesce?: boolean
}

/**
 * Unbounded multi-value channel consumed with `for await`. Closing it ends
 * every pending and future `next()` call.
 */
export class AsyncChannel<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = []
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
  private closed = false

  constructor(private readonly options: ChannelOptions = {}) {}

  get isClosed() {
    return this.closed
  }

  push(value: T) {
    if (this.closed) {
      return
    }
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({ value, done: false })
      return
    }
    if (this.options.coalesce && this.buffer.includes(value)) {
      return
    }
    this.buffer.push(value)
  }

  close() {
    if (this.closed) {
      return
    }
    this.closed = true
    this.buffer.length = 0
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const value = this.buffer.shift()
    if (value !== undefined) {
      return Promise.resolve({ value, done: false })
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  return(): Promise<IteratorResult<T, undefined>> {
    this.close()
    return Promise.resolve({ value: undefined, done: true })
  }

  /** Values currently buffered, without waiting. */
  drain(): T[] {
    return this.buffer.splice(0)
  }

  [Symbol.asyncIterator]() {
    return this
  }
}
