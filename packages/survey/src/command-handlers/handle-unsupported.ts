import type { UnsupportedCommand } from "../commands.js"
import { UnsupportedOperationError } from "../errors.js"

/**
 * Handler for the reserved commands that have no behavior yet.
 */
export async function handleUnsupported(
  command: UnsupportedCommand,
): Promise<void> {
  throw new UnsupportedOperationError(command.type)
}
