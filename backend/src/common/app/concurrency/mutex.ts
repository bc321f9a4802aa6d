/**
 * @file mutex.ts
 * @description
 * Promise-chain lock. Callers queue behind each other in arrival order;
 * a rejected task releases the lock like a resolved one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /** Number of tasks holding or waiting for the lock. */
  get queued(): number {
    return this.pending
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail
    let release: () => void = () => undefined
    this.tail = new Promise<void>((resolve) => {
      release = resolve
    })
    this.pending++

    try {
      await previous
      return await task()
    } finally {
      this.pending--
      release()
    }
  }
}
