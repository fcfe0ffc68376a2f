import type { Logger } from "@logtape/logtape"
import Emittery from "emittery"
import { type AsyncResult, pending } from "./async-result.js"
import {
  BaseDataProvider,
  type Disposer,
  type ResultListener,
} from "./data-provider.js"

type ResultCellEvents<T> = {
  change: AsyncResult<T>
}

/**
 * ResultCell - a single-slot broadcast holder for the latest AsyncResult.
 *
 * Every `set` overwrites the slot, bumps `version` and broadcasts the new
 * result to all listeners. `set` resolves once every listener (and whatever
 * they awaited) has finished, so a writer that awaits it knows the value has
 * reached its observers. Listener faults are logged; `set` never rejects
 * because of them.
 *
 * @example
 * ```typescript
 * const cell = new ResultCell<number>("answer-count")
 * const dispose = cell.subscribe(result => console.log(result))
 * // logs { status: "pending" }
 *
 * await cell.set(success(3))
 * // logs { status: "success", value: 3 }
 *
 * dispose()
 * ```
 */
export class ResultCell<T> extends BaseDataProvider<T> {
  #value: AsyncResult<T>
  #version = 0
  readonly #emitter = new Emittery<ResultCellEvents<T>>()

  constructor(id: string, initial: AsyncResult<T> = pending(), logger?: Logger) {
    super(id, logger)
    this.#value = initial
  }

  current(): AsyncResult<T> {
    return this.#value
  }

  /**
   * Number of times the cell has been written.
   */
  get version(): number {
    return this.#version
  }

  get listenerCount(): number {
    return this.#emitter.listenerCount("change")
  }

  async set(result: AsyncResult<T>): Promise<void> {
    this.#value = result
    this.#version++
    await this.#emitter.emit("change", result)
  }

  onChange(listener: ResultListener<T>): Disposer {
    return this.#emitter.on("change", this.isolate(listener))
  }
}
