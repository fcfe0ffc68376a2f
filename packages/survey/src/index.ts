export * from "./command-queue.js"
export type {
  CommandCallback,
  CommandOfType,
  SurveyCommand,
  SurveyCommandType,
  UnsupportedCommand,
} from "./commands.js"
export { UNSUPPORTED_COMMAND_TYPES } from "./commands.js"
export {
  computeCurrentQuestion,
  deriveEphemeralQuestion,
} from "./derive-question.js"
export * from "./errors.js"
export { SessionActor } from "./session-actor.js"
export {
  hasQuestionsList,
  type SessionModel,
} from "./session-program.js"
export * from "./survey-progress-controller.js"
export * from "./types.js"
export * from "./utils/generate-session-id.js"
