import { getLogger, type Logger } from "@logtape/logtape"
import type { AsyncResult } from "./async-result.js"

export type Disposer = () => void

/**
 * A listener receiving the results published by a provider. Returning a
 * promise makes the publisher wait for it before its own emission settles.
 */
export type ResultListener<T> = (result: AsyncResult<T>) => void | Promise<void>

/**
 * An observable holder of the latest AsyncResult of some value.
 *
 * Providers are state-based: a new subscriber immediately receives the current
 * result, then every later one. Earlier results are never replayed.
 */
export interface DataProvider<T> {
  /** Identifies the provider in logs. */
  readonly id: string

  /** The latest result. */
  current(): AsyncResult<T>

  /** Listen for future results only. */
  onChange(listener: ResultListener<T>): Disposer

  /** Receive the current result right away, then every future one. */
  subscribe(listener: ResultListener<T>): Disposer
}

export function getProvidersLogger(): Logger {
  return getLogger(["questline", "providers"])
}

/**
 * Base class implementing `subscribe` on top of `current` and `onChange`.
 */
export abstract class BaseDataProvider<T> implements DataProvider<T> {
  readonly id: string
  protected readonly logger: Logger

  constructor(id: string, logger?: Logger) {
    this.id = id
    this.logger = (logger ?? getProvidersLogger()).getChild("provider")
  }

  abstract current(): AsyncResult<T>

  abstract onChange(listener: ResultListener<T>): Disposer

  subscribe(listener: ResultListener<T>): Disposer {
    const dispose = this.onChange(listener)
    this.deliver(listener, this.current())
    return dispose
  }

  /**
   * Wrap a listener so that whatever it throws or rejects with is logged
   * instead of reaching the emitter. A faulty observer never fails the
   * writer that published the result.
   */
  protected isolate(
    listener: ResultListener<T>,
  ): (result: AsyncResult<T>) => Promise<void> {
    return async result => {
      try {
        await listener(result)
      } catch (error) {
        this.#reportListenerFault(error)
      }
    }
  }

  /**
   * Call a listener outside of an emission, logging whatever it throws or rejects with.
   */
  protected deliver(listener: ResultListener<T>, result: AsyncResult<T>): void {
    try {
      const pending = listener(result)
      if (pending instanceof Promise) {
        pending.catch(error => this.#reportListenerFault(error))
      }
    } catch (error) {
      this.#reportListenerFault(error)
    }
  }

  #reportListenerFault(error: unknown): void {
    this.logger.error("listener of {id} failed: {error}", {
      id: this.id,
      error,
    })
  }
}
