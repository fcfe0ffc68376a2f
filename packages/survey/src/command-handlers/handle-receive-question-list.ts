import { success } from "@questline/providers"
import type { CommandOfType } from "../commands.js"
import type { CommandContext } from "../command-executor.js"

/**
 * Handle the cmd/receive-question-list command.
 *
 * The list only replaces the stored one (and triggers a recompute) if it
 * differs from it.
 */
export async function handleReceiveQuestionList(
  command: CommandOfType<"cmd/receive-question-list">,
  ctx: CommandContext,
): Promise<void> {
  await ctx.applyMessage({
    type: "session/question-list-received",
    questionsList: command.questionsList,
  })
  await command.callback?.set(success(undefined))
}
