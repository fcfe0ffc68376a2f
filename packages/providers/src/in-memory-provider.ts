import type { Logger } from "@logtape/logtape"
import { success } from "./async-result.js"
import { ResultCell } from "./result-cell.js"

/**
 * A writable provider holding a plain value, always in the success state.
 * Typically the upstream source feeding a controller.
 */
export class InMemoryDataProvider<T> extends ResultCell<T> {
  constructor(id: string, initialValue: T, logger?: Logger) {
    super(id, success(initialValue), logger)
  }

  /**
   * Publish a new value. Listeners are notified even if the value is unchanged,
   * the same way an upstream source re-emits.
   */
  async setValue(value: T): Promise<void> {
    await this.set(success(value))
  }
}

export function createInMemoryDataProvider<T>(
  id: string,
  initialValue: T,
  logger?: Logger,
): InMemoryDataProvider<T> {
  return new InMemoryDataProvider(id, initialValue, logger)
}
