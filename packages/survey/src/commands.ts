import type { ResultCell } from "@questline/providers"
import type {
  EphemeralSurveyQuestion,
  SessionId,
  SurveyQuestion,
  SurveySelectedAnswer,
} from "./types.js"

/**
 * The cell an operation reports its outcome to.
 */
export type CommandCallback = ResultCell<void>

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// COMMANDS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * Commands are the only way to read or change a session's state.
 *
 * They may be submitted from any asynchronous context, but are applied one at
 * a time, in the order the queue accepted them. Every command names the
 * session it targets and is dropped if that session is no longer the live
 * one. `callback`, where present, receives the command's outcome; the
 * callback of a dropped command is never written and stays pending.
 */
export type SurveyCommand =
  // Session lifecycle
  | {
      type: "cmd/initialize"
      sessionId: SessionId
      ephemeralQuestionCell: ResultCell<EphemeralSurveyQuestion>
      callback: CommandCallback
    }
  | {
      type: "cmd/receive-question-list"
      sessionId: SessionId
      questionsList: readonly SurveyQuestion[]
      callback?: CommandCallback
    }
  | {
      type: "cmd/recompute-and-notify"
      sessionId: SessionId
      callback?: CommandCallback
    }

  // Reserved: accepted by the queue, answered with UnsupportedOperationError
  | { type: "cmd/finish-session"; sessionId: SessionId; callback: CommandCallback }
  | {
      type: "cmd/move-to-next-question"
      sessionId: SessionId
      callback: CommandCallback
    }
  | {
      type: "cmd/move-to-previous-question"
      sessionId: SessionId
      callback: CommandCallback
    }
  | {
      type: "cmd/submit-answer"
      sessionId: SessionId
      selectedAnswer: SurveySelectedAnswer
      callback: CommandCallback
    }
  | {
      type: "cmd/save-partial-completion"
      sessionId: SessionId
      callback?: CommandCallback
    }
  | {
      type: "cmd/save-full-completion"
      sessionId: SessionId
      callback?: CommandCallback
    }

export type SurveyCommandType = SurveyCommand["type"]

export type CommandOfType<K extends SurveyCommandType> = Extract<
  SurveyCommand,
  { type: K }
>

export const UNSUPPORTED_COMMAND_TYPES = [
  "cmd/finish-session",
  "cmd/move-to-next-question",
  "cmd/move-to-previous-question",
  "cmd/submit-answer",
  "cmd/save-partial-completion",
  "cmd/save-full-completion",
] as const satisfies readonly SurveyCommandType[]

/**
 * A reserved command: accepted by the queue, answered with UnsupportedOperationError.
 */
export type UnsupportedCommand = CommandOfType<
  (typeof UNSUPPORTED_COMMAND_TYPES)[number]
>
