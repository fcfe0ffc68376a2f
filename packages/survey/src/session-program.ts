/**
 * Session Program - the state of one survey session and how it changes
 *
 * The update function is pure: it takes a message and the current model and
 * returns the next model together with an optional effect for the caller to
 * run. Updates are written against a mutable draft and turned immutable by
 * the mutative library.
 */

import { getLogger, type Logger } from "@logtape/logtape"
import equal from "fast-deep-equal"
import type { Patch } from "mutative"
import type { SessionId, SurveyQuestion } from "./types.js"
import { makeImmutableUpdate } from "./utils/make-immutable-update.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// STATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type SessionModel = {
  /** The session this state belongs to */
  sessionId: SessionId

  /**
   * The questions of the session, in order.
   *
   * Undefined until the first question list has been received; check
   * `hasQuestionsList` before reading it.
   */
  questionsList: readonly SurveyQuestion[] | undefined
}

export type InitializedSessionModel = SessionModel & {
  questionsList: readonly SurveyQuestion[]
}

export function hasQuestionsList(
  model: SessionModel,
): model is InitializedSessionModel {
  return model.questionsList !== undefined
}

export function init(sessionId: SessionId): SessionModel {
  return { sessionId, questionsList: undefined }
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// MESSAGES & EFFECTS
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export type SessionMessage = {
  type: "session/question-list-received"
  questionsList: readonly SurveyQuestion[]
}

export type SessionEffect = { type: "effect/recompute-and-notify" }

export type SessionUpdate = (
  msg: SessionMessage,
  model: SessionModel,
) => [SessionModel, SessionEffect | undefined]

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// UPDATE
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

function createSessionLogic(sessionLogger: Logger) {
  const logger = sessionLogger.getChild("program")

  return function mutatingUpdate(
    msg: SessionMessage,
    model: SessionModel,
  ): SessionEffect | undefined {
    switch (msg.type) {
      case "session/question-list-received": {
        // An upstream source may re-emit an unchanged list; recomputing for it
        // would notify observers for nothing.
        if (
          hasQuestionsList(model) &&
          equal(model.questionsList, msg.questionsList)
        ) {
          logger.trace("unchanged question list for {sessionId}", {
            sessionId: model.sessionId,
          })
          return undefined
        }

        model.questionsList = [...msg.questionsList]
        logger.trace("stored {count} questions for {sessionId}", {
          sessionId: model.sessionId,
          count: msg.questionsList.length,
        })
        return { type: "effect/recompute-and-notify" }
      }
    }
  }
}

type CreateSessionUpdateParams = {
  logger?: Logger
  onUpdate?: (patches: Patch[]) => void
}

/**
 * Creates the session update function.
 *
 * @param logger - Optional logger (defaults to the survey logger)
 * @param onUpdate - Optional callback receiving the patches of each change
 */
export function createSessionUpdate({
  logger,
  onUpdate,
}: CreateSessionUpdateParams = {}): SessionUpdate {
  return makeImmutableUpdate(
    createSessionLogic(logger ?? getLogger(["questline", "survey"])),
    onUpdate,
  )
}
