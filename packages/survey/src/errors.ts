export type SurveyProgressErrorCode =
  | "SESSION_NOT_INITIALIZED"
  | "COMMAND_REJECTED"
  | "NOT_IMPLEMENTED"
  | "EMPTY_QUESTION_LIST"

/**
 * Base class of every error the survey controller reports.
 */
export class SurveyProgressError extends Error {
  constructor(
    public readonly code: SurveyProgressErrorCode,
    message: string,
  ) {
    super(message)
    this.name = "SurveyProgressError"
  }
}

/**
 * Reported when an operation needs a session but none has begun.
 */
export class SessionNotInitializedError extends SurveyProgressError {
  constructor() {
    super("SESSION_NOT_INITIALIZED", "session not initialized")
    this.name = "SessionNotInitializedError"
  }
}

/**
 * Reported when the command queue refuses a command.
 */
export class CommandRejectedError extends SurveyProgressError {
  constructor(message: string) {
    super("COMMAND_REJECTED", message)
    this.name = "CommandRejectedError"
  }
}

/**
 * Reported for commands that are reserved but have no behavior yet.
 */
export class UnsupportedOperationError extends SurveyProgressError {
  constructor(public readonly commandType: string) {
    super("NOT_IMPLEMENTED", `'${commandType}' is not implemented yet`)
    this.name = "UnsupportedOperationError"
  }
}

export class EmptyQuestionListError extends SurveyProgressError {
  constructor() {
    super("EMPTY_QUESTION_LIST", "the survey has no questions to show")
    this.name = "EmptyQuestionListError"
  }
}
