import { success } from "@questline/providers"
import type { CommandOfType } from "../commands.js"
import type { CommandContext } from "../command-executor.js"

/**
 * Handle the cmd/recompute-and-notify command.
 *
 * Used when something outside the question list changed what the current
 * question should look like.
 */
export async function handleRecomputeAndNotify(
  command: CommandOfType<"cmd/recompute-and-notify">,
  ctx: CommandContext,
): Promise<void> {
  await ctx.recomputeAndNotify()
  await command.callback?.set(success(undefined))
}
