/**
 * CommandQueue - Unbounded FIFO drained by a single asynchronous worker
 *
 * Any number of callers may `offer` items at any time; offering never waits.
 * Exactly one worker takes items off the queue and awaits `process` for each
 * before starting the next, so items are applied one at a time in the order
 * they were accepted.
 *
 * @example
 * ```typescript
 * const queue = new CommandQueue<string>({
 *   process: async item => applyItem(item),
 *   onQuiescent: () => logger.trace("drained"),
 *   onError: error => logger.error("{error}", { error }),
 * })
 *
 * queue.offer("a")
 * queue.offer("b")
 * await queue.whenIdle()
 * // "a" then "b" applied, then onQuiescent called
 * ```
 */

type CommandQueueParams<T> = {
  /** Applies one item. */
  process: (item: T) => Promise<void>

  /** Called whenever the worker has drained the queue. */
  onQuiescent?: () => void

  /** Receives whatever `process` or `onQuiescent` throws. The worker keeps going. */
  onError: (error: unknown, item: T | undefined) => void
}

export class CommandQueue<T> {
  #queue: T[] = []
  #isProcessing = false
  #isClosed = false
  #idle: Promise<void> = Promise.resolve()
  readonly #process: (item: T) => Promise<void>
  readonly #onQuiescent: (() => void) | undefined
  readonly #onError: (error: unknown, item: T | undefined) => void

  constructor({ process, onQuiescent, onError }: CommandQueueParams<T>) {
    this.#process = process
    this.#onQuiescent = onQuiescent
    this.#onError = onError
  }

  /**
   * Enqueue an item without waiting.
   *
   * @returns false if the queue is closed and the item was not accepted
   */
  offer(item: T): boolean {
    if (this.#isClosed) return false

    this.#queue.push(item)
    if (!this.#isProcessing) {
      this.#isProcessing = true
      this.#idle = this.#processUntilQuiescent()
    }
    return true
  }

  /**
   * Stop accepting items. Items already accepted are still processed.
   */
  close(): void {
    this.#isClosed = true
  }

  get isClosed(): boolean {
    return this.#isClosed
  }

  /**
   * True while the worker is draining the queue.
   */
  get isProcessing(): boolean {
    return this.#isProcessing
  }

  /**
   * Number of accepted items not yet taken by the worker.
   */
  get size(): number {
    return this.#queue.length
  }

  /**
   * Resolves once every item accepted so far has been processed.
   */
  async whenIdle(): Promise<void> {
    while (this.#isProcessing) {
      await this.#idle
    }
  }

  async #processUntilQuiescent(): Promise<void> {
    // Let the offering caller finish its synchronous work first
    await Promise.resolve()

    try {
      while (this.#queue.length > 0) {
        const [item] = this.#queue.splice(0, 1)
        try {
          await this.#process(item)
        } catch (error) {
          this.#onError(error, item)
        }
      }

      try {
        this.#onQuiescent?.()
      } catch (error) {
        this.#onError(error, undefined)
      }
    } finally {
      this.#isProcessing = false
    }

    // onQuiescent may have offered more work while the flag was still set
    if (this.#queue.length > 0) {
      this.#isProcessing = true
      await this.#processUntilQuiescent()
    }
  }
}
