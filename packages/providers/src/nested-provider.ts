import type { Logger } from "@logtape/logtape"
import { type AsyncResult, failure, pending } from "./async-result.js"
import {
  BaseDataProvider,
  type DataProvider,
  type Disposer,
  type ResultListener,
} from "./data-provider.js"
import { ResultCell } from "./result-cell.js"

/**
 * Turns a successful upstream value into a result of its own. Throwing or
 * rejecting produces a failure.
 */
export type NestedTransform<T, R> = (
  value: T,
) => AsyncResult<R> | Promise<AsyncResult<R>>

/**
 * NestedTransformedDataProvider - a transformed view of a base provider whose
 * base can be swapped at any time.
 *
 * The base is listened to eagerly from the moment it is set: the transform
 * runs for its current value right away and for every value it publishes
 * afterwards. Subscribers of this provider stay attached across swaps and
 * simply start receiving the results derived from the new base.
 */
export class NestedTransformedDataProvider<T, R> extends BaseDataProvider<R> {
  readonly #output: ResultCell<R>
  #detachBase: Disposer | undefined
  #generation = 0

  constructor(
    id: string,
    base: DataProvider<T>,
    transform: NestedTransform<T, R>,
    logger?: Logger,
  ) {
    super(id, logger)
    this.#output = new ResultCell<R>(`${id}.output`, pending(), logger)
    this.setBaseProvider(base, transform)
  }

  current(): AsyncResult<R> {
    return this.#output.current()
  }

  onChange(listener: ResultListener<R>): Disposer {
    return this.#output.onChange(listener)
  }

  /**
   * Detach from the current base and attach to `base`. Results still in
   * flight from the previous base are discarded.
   */
  setBaseProvider(base: DataProvider<T>, transform: NestedTransform<T, R>): void {
    this.#detachBase?.()
    const generation = ++this.#generation

    this.logger.debug("{id} now follows {baseId}", {
      id: this.id,
      baseId: base.id,
    })

    this.#detachBase = base.subscribe(result => {
      if (generation !== this.#generation) return

      // Synchronous transforms publish before subscribe returns, so `current`
      // is up to date as soon as the base has been set
      const transformed = this.#applyTransform(transform, result)
      if (transformed instanceof Promise) {
        return transformed.then(async asyncResult => {
          if (generation !== this.#generation) return
          await this.#output.set(asyncResult)
        })
      }
      return this.#output.set(transformed)
    })
  }

  /**
   * Stop following the base. The last result is kept.
   */
  dispose(): void {
    this.#generation++
    this.#detachBase?.()
    this.#detachBase = undefined
  }

  #applyTransform(
    transform: NestedTransform<T, R>,
    result: AsyncResult<T>,
  ): AsyncResult<R> | Promise<AsyncResult<R>> {
    switch (result.status) {
      case "pending":
        return pending()
      case "failure":
        return failure(result.error)
      case "success":
        try {
          const transformed = transform(result.value)
          if (transformed instanceof Promise) {
            return transformed.catch(error => failure(error))
          }
          return transformed
        } catch (error) {
          return failure(error)
        }
    }
  }
}
