import { getLogger, type Logger } from "@logtape/logtape"
import {
  type AsyncResult,
  type DataProvider,
  combineWith,
  failure,
  InMemoryDataProvider,
  NestedTransformedDataProvider,
  pending,
  ResultCell,
  success,
} from "@questline/providers"
import type { Patch } from "mutative"
import type { SurveyCommand } from "./commands.js"
import {
  CommandRejectedError,
  SessionNotInitializedError,
} from "./errors.js"
import { SessionActor } from "./session-actor.js"
import type {
  EphemeralSurveyQuestion,
  SessionId,
  SurveyQuestion,
  SurveySelectedAnswer,
} from "./types.js"
import { generateSessionId as defaultGenerateSessionId } from "./utils/generate-session-id.js"

const EMPTY_QUESTIONS_LIST_PROVIDER_ID =
  "SurveyProgressController.empty_questions_list"
const MONITORED_QUESTION_LIST_PROVIDER_ID =
  "SurveyProgressController.monitored_question_list"
const CURRENT_QUESTION_PROVIDER_ID =
  "SurveyProgressController.current_question"
const EPHEMERAL_QUESTION_FROM_UPDATED_QUESTION_LIST_PROVIDER_ID =
  "SurveyProgressController.ephemeral_question_from_updated_question_list"
const OPERATION_RESULT_PROVIDER_ID = "SurveyProgressController.result"

/**
 * The session ID used while no session has begun. Never matches a live
 * session, so commands carrying it are always dropped.
 */
export const DEFAULT_SESSION_ID = "default_session_id"

export type SurveyProgressControllerParams = {
  logger?: Logger
  /** Receives the patches of every change to a session's state */
  onStateChange?: (patches: Patch[]) => void
  generateSessionId?: () => SessionId
}

type QuestionsListTransform = (
  questionsList: readonly SurveyQuestion[],
) => AsyncResult<void>

/**
 * Tracks the non-persisted progress through a survey.
 *
 * Each call to `beginSurveySession` starts a new session with its own
 * identity, command queue and current-question cell. The previous session is
 * not stopped, but nothing it does can reach the new session's outputs: its
 * commands stay on its own queue and the controller only ever talks to the
 * newest one.
 *
 * No method throws or blocks. Every operation reports its outcome through the
 * provider it returns.
 *
 * @example
 * ```typescript
 * const controller = new SurveyProgressController()
 * const questions = new InMemoryDataProvider("questions", surveyQuestions)
 *
 * controller.beginSurveySession(questions)
 * controller.getCurrentQuestion().subscribe(result => {
 *   if (result.status === "success") render(result.value.question)
 * })
 * ```
 */
export class SurveyProgressController {
  readonly logger: Logger

  readonly #onStateChange: ((patches: Patch[]) => void) | undefined
  readonly #generateSessionId: () => SessionId

  #mostRecentSessionId: SessionId | undefined
  #mostRecentEphemeralQuestionCell: ResultCell<EphemeralSurveyQuestion>
  #mostRecentCommandQueue: SessionActor | undefined

  /**
   * Follows the question list of the newest session. Every list it sees is
   * forwarded to the newest session's queue, and `getCurrentQuestion` combines
   * it with the current question so a changed list always leads to a recompute.
   */
  readonly #monitoredQuestionListProvider: NestedTransformedDataProvider<
    readonly SurveyQuestion[],
    void
  >

  constructor({
    logger,
    onStateChange,
    generateSessionId = defaultGenerateSessionId,
  }: SurveyProgressControllerParams = {}) {
    this.logger = (logger ?? getLogger(["questline", "survey"])).getChild(
      "controller",
    )
    this.#onStateChange = onStateChange
    this.#generateSessionId = generateSessionId

    this.#mostRecentEphemeralQuestionCell = new ResultCell(
      CURRENT_QUESTION_PROVIDER_ID,
      failure(new SessionNotInitializedError()),
      this.logger,
    )

    // Before any session there is no queue to forward the list to
    this.#monitoredQuestionListProvider = new NestedTransformedDataProvider<
      readonly SurveyQuestion[],
      void
    >(
      MONITORED_QUESTION_LIST_PROVIDER_ID,
      new InMemoryDataProvider<readonly SurveyQuestion[]>(
        EMPTY_QUESTIONS_LIST_PROVIDER_ID,
        [],
        this.logger,
      ),
      () => success(undefined),
      this.logger,
    )
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // PUBLIC API - Session
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  /**
   * The identity of the newest session, or DEFAULT_SESSION_ID before the first one.
   */
  get activeSessionId(): SessionId {
    return this.#mostRecentSessionId ?? DEFAULT_SESSION_ID
  }

  /**
   * Begin a survey session over the questions published by `questionsListProvider`.
   *
   * @returns A provider that succeeds once the session is initialized, or fails
   */
  beginSurveySession(
    questionsListProvider: DataProvider<readonly SurveyQuestion[]>,
  ): DataProvider<void> {
    const sessionId = this.#generateSessionId()
    const ephemeralQuestionCell = new ResultCell<EphemeralSurveyQuestion>(
      `${CURRENT_QUESTION_PROVIDER_ID}_${sessionId}`,
      pending(),
      this.logger,
    )
    const commandQueue = new SessionActor({
      logger: this.logger,
      onStateChange: this.#onStateChange,
    })

    this.#mostRecentSessionId = sessionId
    this.#mostRecentEphemeralQuestionCell = ephemeralQuestionCell
    this.#mostRecentCommandQueue = commandQueue

    this.logger.debug("beginning session {sessionId} over {providerId}", {
      sessionId,
      providerId: questionsListProvider.id,
    })

    const beginSessionResult = this.#createOperationResult("begin_session")
    this.#sendCommandForOperation(
      {
        type: "cmd/initialize",
        sessionId,
        ephemeralQuestionCell,
        callback: beginSessionResult,
      },
      () =>
        "Failed to schedule command for initializing the survey progress controller.",
    )

    // Rebinding delivers the current list right away, so it must come after
    // initialize has been queued
    this.#monitoredQuestionListProvider.setBaseProvider(
      questionsListProvider,
      this.#createQuestionsListForwarder(commandQueue, sessionId),
    )

    return beginSessionResult
  }

  /**
   * The question currently shown in the newest session.
   *
   * Fails with SessionNotInitializedError before the first session, and is
   * pending until the session's question list has arrived.
   */
  getCurrentQuestion(): DataProvider<EphemeralSurveyQuestion> {
    return combineWith(
      this.#monitoredQuestionListProvider,
      this.#mostRecentEphemeralQuestionCell,
      EPHEMERAL_QUESTION_FROM_UPDATED_QUESTION_LIST_PROVIDER_ID,
      (_, currentQuestion) => currentQuestion,
      this.logger,
    )
  }

  /**
   * Resolves once every command accepted by the newest session has been applied.
   */
  async whenIdle(): Promise<void> {
    await this.#mostRecentCommandQueue?.whenIdle()
  }

  /**
   * Stop following the question list and reject further commands. The
   * outputs keep their last results.
   */
  dispose(): void {
    this.#monitoredQuestionListProvider.dispose()
    this.#mostRecentCommandQueue?.close()
    this.logger.debug("disposed session {sessionId}", {
      sessionId: this.activeSessionId,
    })
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // PUBLIC API - Operations
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  /**
   * Re-derive the current question of the newest session and publish it.
   */
  recomputeCurrentQuestion(): DataProvider<void> {
    const callback = this.#createOperationResult("recompute_current_question")
    this.#sendCommandForOperation(
      {
        type: "cmd/recompute-and-notify",
        sessionId: this.activeSessionId,
        callback,
      },
      () => "Failed to schedule command for recomputing the current question.",
    )
    return callback
  }

  submitAnswer(selectedAnswer: SurveySelectedAnswer): DataProvider<void> {
    const callback = this.#createOperationResult("submit_answer")
    this.#sendCommandForOperation(
      {
        type: "cmd/submit-answer",
        sessionId: this.activeSessionId,
        selectedAnswer,
        callback,
      },
      () => "Failed to schedule command for submitting an answer.",
    )
    return callback
  }

  moveToNextQuestion(): DataProvider<void> {
    const callback = this.#createOperationResult("move_to_next_question")
    this.#sendCommandForOperation(
      {
        type: "cmd/move-to-next-question",
        sessionId: this.activeSessionId,
        callback,
      },
      () => "Failed to schedule command for moving to the next question.",
    )
    return callback
  }

  moveToPreviousQuestion(): DataProvider<void> {
    const callback = this.#createOperationResult("move_to_previous_question")
    this.#sendCommandForOperation(
      {
        type: "cmd/move-to-previous-question",
        sessionId: this.activeSessionId,
        callback,
      },
      () => "Failed to schedule command for moving to the previous question.",
    )
    return callback
  }

  finishSurveySession(): DataProvider<void> {
    const callback = this.#createOperationResult("finish_session")
    this.#sendCommandForOperation(
      { type: "cmd/finish-session", sessionId: this.activeSessionId, callback },
      () => "Failed to schedule command for finishing the survey session.",
    )
    return callback
  }

  /**
   * Mark the mandatory part of the survey as completed.
   */
  savePartialCompletion(): DataProvider<void> {
    const callback = this.#createOperationResult("save_partial_completion")
    this.#sendCommandForOperation(
      {
        type: "cmd/save-partial-completion",
        sessionId: this.activeSessionId,
        callback,
      },
      () => "Failed to schedule command for saving a partial completion.",
    )
    return callback
  }

  /**
   * Mark the optional part of the survey as completed too.
   */
  saveFullCompletion(): DataProvider<void> {
    const callback = this.#createOperationResult("save_full_completion")
    this.#sendCommandForOperation(
      {
        type: "cmd/save-full-completion",
        sessionId: this.activeSessionId,
        callback,
      },
      () => "Failed to schedule command for saving a full completion.",
    )
    return callback
  }

  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
  // INTERNALS
  // =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

  #createOperationResult(name: string): ResultCell<void> {
    return new ResultCell<void>(
      `${OPERATION_RESULT_PROVIDER_ID}.${name}_${this.activeSessionId}`,
      pending(),
      this.logger,
    )
  }

  /**
   * Offer a command to the newest session without waiting.
   *
   * The command's callback becomes pending if the command was accepted (the
   * worker resolves it later) and a failure if there is no queue or the queue
   * refused it.
   */
  #sendCommandForOperation(
    command: SurveyCommand,
    lazyFailureMessage: () => string,
  ): void {
    let result: AsyncResult<void>
    try {
      const commandQueue = this.#mostRecentCommandQueue
      if (!commandQueue) {
        result = failure(new SessionNotInitializedError())
      } else if (!commandQueue.submit(command)) {
        result = failure(new CommandRejectedError(lazyFailureMessage()))
      } else {
        result = pending()
      }
    } catch (error) {
      result = failure(error)
    }

    if (result.status === "failure") {
      this.logger.debug("{type} not scheduled: {error}", {
        type: command.type,
        error: result.error,
      })
    }

    command.callback?.set(result).catch(error => {
      this.logger.error("failed to publish the result of {type}: {error}", {
        type: command.type,
        error,
      })
    })
  }

  /**
   * Forward every question list published upstream to `commandQueue`, tagged
   * with `sessionId`.
   */
  #createQuestionsListForwarder(
    commandQueue: SessionActor,
    sessionId: SessionId,
  ): QuestionsListTransform {
    return questionsList => {
      this.logger.trace("received {count} questions for {sessionId}", {
        count: questionsList.length,
        sessionId,
      })
      const accepted = commandQueue.submit({
        type: "cmd/receive-question-list",
        sessionId,
        questionsList,
      })
      if (!accepted) {
        return failure(
          new CommandRejectedError(
            "Failed to schedule command for receiving the question list.",
          ),
        )
      }
      return success(undefined)
    }
  }
}
