import { getLogger } from "@logtape/logtape"
import type { AsyncResult, ResultCell } from "@questline/providers"
import { vi } from "vitest"
import type { CommandContext, SessionState } from "./command-executor.js"
import { init, type SessionMessage } from "./session-program.js"
import type {
  EphemeralSurveyQuestion,
  SessionId,
  SurveyQuestion,
} from "./types.js"

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// FIXTURES
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

export const testLogger = getLogger(["questline", "test"])

export const QUESTIONS: readonly SurveyQuestion[] = [
  { questionId: "q-user-type", questionName: "user-type" },
  { questionId: "q-market-fit", questionName: "market-fit" },
  { questionId: "q-nps", questionName: "nps" },
]

/**
 * A list equal to `questions` by value but sharing no objects with it.
 */
export function copyQuestions(
  questions: readonly SurveyQuestion[],
): SurveyQuestion[] {
  return questions.map(question => ({ ...question }))
}

/**
 * Session IDs "session-1", "session-2", ... in call order.
 */
export function sequentialSessionIds(): () => SessionId {
  let next = 0
  return () => `session-${++next}`
}

export function errorOf<T>(result: AsyncResult<T>): Error | undefined {
  return result.status === "failure" ? result.error : undefined
}

// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=
// MOCK COMMAND CONTEXT
// =-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=-=

/**
 * A command context whose operations are spies. `beginState` returns a fresh
 * state without storing it anywhere.
 */
export function createMockCommandContext(state?: SessionState) {
  return {
    state,
    logger: testLogger,
    beginState: vi.fn(
      (
        sessionId: SessionId,
        ephemeralQuestionCell: ResultCell<EphemeralSurveyQuestion>,
      ): SessionState => ({ model: init(sessionId), ephemeralQuestionCell }),
    ),
    applyMessage: vi.fn(async (_message: SessionMessage) => {}),
    recomputeAndNotify: vi.fn(async () => {}),
  } satisfies CommandContext
}
