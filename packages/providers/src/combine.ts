import type { Logger } from "@logtape/logtape"
import Emittery from "emittery"
import { type AsyncResult, combineResults } from "./async-result.js"
import {
  BaseDataProvider,
  type DataProvider,
  type Disposer,
  type ResultListener,
} from "./data-provider.js"

type CombinedEvents<R> = {
  change: AsyncResult<R>
}

/**
 * A provider derived from two others. Its result is recomputed from the
 * latest results of both inputs whenever either of them changes.
 *
 * Inputs are only listened to while the combined provider has listeners of
 * its own.
 */
export class CombinedDataProvider<A, B, R> extends BaseDataProvider<R> {
  readonly #first: DataProvider<A>
  readonly #second: DataProvider<B>
  readonly #combiner: (a: A, b: B) => R
  readonly #emitter = new Emittery<CombinedEvents<R>>()
  #detachInputs: Disposer | undefined

  constructor(
    id: string,
    first: DataProvider<A>,
    second: DataProvider<B>,
    combiner: (a: A, b: B) => R,
    logger?: Logger,
  ) {
    super(id, logger)
    this.#first = first
    this.#second = second
    this.#combiner = combiner
  }

  current(): AsyncResult<R> {
    return combineResults(
      this.#first.current(),
      this.#second.current(),
      this.#combiner,
    )
  }

  onChange(listener: ResultListener<R>): Disposer {
    const off = this.#emitter.on("change", this.isolate(listener))
    this.#attachInputs()

    return () => {
      off()
      if (this.#emitter.listenerCount("change") === 0) {
        this.#detachInputs?.()
        this.#detachInputs = undefined
      }
    }
  }

  /**
   * Whether the provider currently listens to its inputs.
   */
  get isAttached(): boolean {
    return this.#detachInputs !== undefined
  }

  #attachInputs(): void {
    if (this.#detachInputs) return

    const republish = async () => {
      const result = this.current()
      this.logger.trace("recomputed {id}: {status}", {
        id: this.id,
        status: result.status,
      })
      await this.#emitter.emit("change", result)
    }

    const offFirst = this.#first.onChange(republish)
    const offSecond = this.#second.onChange(republish)
    this.#detachInputs = () => {
      offFirst()
      offSecond()
    }
  }
}

/**
 * Combine two providers into one whose value is `combiner(a, b)`.
 *
 * A failure or pending state of `first` takes precedence over `second`.
 *
 * @example
 * ```typescript
 * const label = combineWith(count, name, "label", (n, s) => `${s}: ${n}`)
 * ```
 */
export function combineWith<A, B, R>(
  first: DataProvider<A>,
  second: DataProvider<B>,
  id: string,
  combiner: (a: A, b: B) => R,
  logger?: Logger,
): CombinedDataProvider<A, B, R> {
  return new CombinedDataProvider(id, first, second, combiner, logger)
}
