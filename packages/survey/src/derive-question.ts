import {
  type AsyncResult,
  failure,
  pending,
  success,
} from "@questline/providers"
import { EmptyQuestionListError } from "./errors.js"
import { type SessionModel, hasQuestionsList } from "./session-program.js"
import type { EphemeralSurveyQuestion, SurveyQuestion } from "./types.js"

/**
 * Wrap the question to show for `questionsList`.
 *
 * Always the first question: progress through the list is not tracked yet,
 * so moving between questions has no effect on what is shown.
 */
export function deriveEphemeralQuestion(
  questionsList: readonly SurveyQuestion[],
): EphemeralSurveyQuestion {
  const question = questionsList[0]
  if (!question) {
    throw new EmptyQuestionListError()
  }
  return {
    question,
    currentQuestionIndex: 0,
    totalQuestionCount: questionsList.length,
  }
}

/**
 * The current question of a session: pending until its question list has
 * arrived, a failure if no question can be derived from it.
 */
export function computeCurrentQuestion(
  model: SessionModel,
): AsyncResult<EphemeralSurveyQuestion> {
  if (!hasQuestionsList(model)) {
    return pending()
  }
  try {
    return success(deriveEphemeralQuestion(model.questionsList))
  } catch (error) {
    return failure(error)
  }
}
