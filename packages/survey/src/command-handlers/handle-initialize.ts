import { success } from "@questline/providers"
import type { CommandOfType } from "../commands.js"
import type { CommandContext } from "../command-executor.js"

/**
 * Handle the cmd/initialize command.
 *
 * Replaces the live state with a fresh one for the command's session, publishes
 * its (still pending) current question, then reports success. If publishing
 * fails, the failure reaches the callback through the actor instead.
 */
export async function handleInitialize(
  command: CommandOfType<"cmd/initialize">,
  ctx: CommandContext,
): Promise<void> {
  ctx.beginState(command.sessionId, command.ephemeralQuestionCell)
  ctx.logger.debug("initialized session {sessionId}", {
    sessionId: command.sessionId,
  })

  await ctx.recomputeAndNotify()
  await command.callback.set(success(undefined))
}
