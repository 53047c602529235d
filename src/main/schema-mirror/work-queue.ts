/**
 * FIFO shared by all workers of a run. tryDequeue never waits: an empty
 * queue returns undefined and the caller stops.
 */
export class WorkQueue<T> {
  private readonly items: readonly T[]
  private head = 0

  constructor(items: readonly T[]) {
    this.items = [...items]
  }

  tryDequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined
    const item = this.items[this.head]
    this.head++
    return item
  }

  get remaining(): number {
    return this.items.length - this.head
  }

  get size(): number {
    return this.items.length
  }
}
