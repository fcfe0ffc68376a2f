import {
  type AsyncResult,
  type FailureResult,
  isCompleted,
  type SuccessResult,
} from "./async-result.js"
import type { DataProvider, Disposer } from "./data-provider.js"

export class TimeoutError extends Error {
  constructor(msg?: string) {
    super(msg ?? "Timed out")
    this.name = "TimeoutError"
  }
}

export type WaitForResultOptions = {
  /**
   * Milliseconds to wait before rejecting with a TimeoutError. 0 disables the timeout.
   * @default 5000
   */
  timeout?: number
}

/**
 * Resolve with the first result of `provider` (its current one included)
 * narrowed by `guard`.
 *
 * @throws TimeoutError if no matching result arrives within the timeout
 */
export function waitFor<T, S extends AsyncResult<T>>(
  provider: DataProvider<T>,
  guard: (result: AsyncResult<T>) => result is S,
  { timeout = 5000 }: WaitForResultOptions = {},
): Promise<S> {
  return new Promise<S>((resolve, reject) => {
    let settled = false
    let dispose: Disposer | undefined
    let timer: ReturnType<typeof setTimeout> | undefined

    const finish = () => {
      settled = true
      dispose?.()
      if (timer) clearTimeout(timer)
    }

    dispose = provider.subscribe(result => {
      if (settled || !guard(result)) return
      finish()
      resolve(result)
    })

    // The current result may already have matched during subscribe
    if (settled) {
      dispose()
      return
    }

    if (timeout > 0) {
      timer = setTimeout(() => {
        if (settled) return
        finish()
        reject(
          new TimeoutError(
            `Timed out after ${timeout}ms waiting for a result from '${provider.id}'`,
          ),
        )
      }, timeout)
    }
  })
}

/**
 * Resolve with the first result of `provider` that satisfies `predicate`.
 */
export function waitForResult<T>(
  provider: DataProvider<T>,
  predicate: (result: AsyncResult<T>) => boolean,
  options?: WaitForResultOptions,
): Promise<AsyncResult<T>> {
  return waitFor(
    provider,
    (result): result is AsyncResult<T> => predicate(result),
    options,
  )
}

/**
 * Resolve with the first result of `provider` that is no longer pending.
 */
export function waitForCompletion<T>(
  provider: DataProvider<T>,
  options?: WaitForResultOptions,
): Promise<SuccessResult<T> | FailureResult> {
  return waitFor<T, SuccessResult<T> | FailureResult>(
    provider,
    isCompleted,
    options,
  )
}
