/**
 * Serial Queue
 *
 * Runs async tasks one at a time, in the order they were submitted.
 * A failed task does not block the ones queued behind it.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0

  /**
   * Queue a task. Resolves or rejects with the task's own outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++
    const result = this.tail.then(task)

    this.tail = result.then(
      () => {
        this.pending--
      },
      () => {
        this.pending--
      },
    )

    return result
  }

  /** Tasks submitted but not yet settled */
  get size(): number {
    return this.pending
  }

  /** Resolves once every task submitted so far has settled */
  drain(): Promise<void> {
    return this.tail
  }
}
