// ═══════════════════════════════════════════════════════════════════════════
// AsyncResult
// ═══════════════════════════════════════════════════════════════════════════
//
// The latest known outcome of an asynchronous computation. An AsyncResult is
// a value that gets overwritten as the computation progresses, never a queue:
// readers only ever look at the current one.

export type PendingResult = {
  status: "pending"
}

export type SuccessResult<T> = {
  status: "success"
  value: T
}

export type FailureResult = {
  status: "failure"
  error: Error
}

export type AsyncResult<T> = PendingResult | SuccessResult<T> | FailureResult

export function pending(): PendingResult {
  return { status: "pending" }
}

export function success<T>(value: T): SuccessResult<T> {
  return { status: "success", value }
}

export function failure(error: unknown): FailureResult {
  return { status: "failure", error: toError(error) }
}

export function isPending<T>(result: AsyncResult<T>): result is PendingResult {
  return result.status === "pending"
}

export function isSuccess<T>(
  result: AsyncResult<T>,
): result is SuccessResult<T> {
  return result.status === "success"
}

export function isFailure<T>(result: AsyncResult<T>): result is FailureResult {
  return result.status === "failure"
}

/**
 * True once the result is no longer pending.
 */
export function isCompleted<T>(
  result: AsyncResult<T>,
): result is SuccessResult<T> | FailureResult {
  return result.status !== "pending"
}

/**
 * Wrap non-Error throwables in an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Map the value of a successful result. Pending and failed results pass through,
 * and a throwing transform turns into a failure.
 */
export function mapResult<T, R>(
  result: AsyncResult<T>,
  transform: (value: T) => R,
): AsyncResult<R> {
  switch (result.status) {
    case "pending":
      return pending()
    case "failure":
      return failure(result.error)
    case "success":
      try {
        return success(transform(result.value))
      } catch (error) {
        return failure(error)
      }
  }
}

/**
 * Combine two results. The first result takes precedence: its failure or
 * pending state wins before the second result is looked at.
 */
export function combineResults<A, B, R>(
  first: AsyncResult<A>,
  second: AsyncResult<B>,
  combiner: (a: A, b: B) => R,
): AsyncResult<R> {
  if (first.status !== "success") {
    return first.status === "pending" ? pending() : failure(first.error)
  }
  if (second.status !== "success") {
    return second.status === "pending" ? pending() : failure(second.error)
  }
  try {
    return success(combiner(first.value, second.value))
  } catch (error) {
    return failure(error)
  }
}
