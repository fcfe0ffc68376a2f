/**
 * Command Handler Registry
 *
 * Maps every command type to its handler. To add a new command:
 * 1. Add it to SurveyCommand in commands.ts
 * 2. Create a handler file: handle-<command-name>.ts
 * 3. Register it below (the registry type requires it)
 */

import type { CommandHandlers } from "../command-executor.js"
import { handleInitialize } from "./handle-initialize.js"
import { handleReceiveQuestionList } from "./handle-receive-question-list.js"
import { handleRecomputeAndNotify } from "./handle-recompute-and-notify.js"
import { handleUnsupported } from "./handle-unsupported.js"

export const commandHandlers: CommandHandlers = {
  "cmd/initialize": handleInitialize,
  "cmd/receive-question-list": handleReceiveQuestionList,
  "cmd/recompute-and-notify": handleRecomputeAndNotify,
  "cmd/finish-session": handleUnsupported,
  "cmd/move-to-next-question": handleUnsupported,
  "cmd/move-to-previous-question": handleUnsupported,
  "cmd/submit-answer": handleUnsupported,
  "cmd/save-partial-completion": handleUnsupported,
  "cmd/save-full-completion": handleUnsupported,
}
