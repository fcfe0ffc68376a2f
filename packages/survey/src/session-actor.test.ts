import {
  type AsyncResult,
  pending,
  ResultCell,
  success,
} from "@questline/providers"
import { describe, expect, it, vi } from "vitest"
import { commandHandlers } from "./command-handlers/index.js"
import { deriveEphemeralQuestion } from "./derive-question.js"
import { UnsupportedOperationError } from "./errors.js"
import { SessionActor } from "./session-actor.js"
import {
  copyQuestions,
  errorOf,
  QUESTIONS,
  testLogger,
} from "./test-utils.js"
import type { EphemeralSurveyQuestion, SurveyQuestion } from "./types.js"

function createSession(sessionId = "session-1") {
  const actor = new SessionActor({ logger: testLogger })
  const cell = new ResultCell<EphemeralSurveyQuestion>(`cell-${sessionId}`)
  const initialized = new ResultCell<void>(`initialized-${sessionId}`)
  actor.submit({
    type: "cmd/initialize",
    sessionId,
    ephemeralQuestionCell: cell,
    callback: initialized,
  })
  return { actor, cell, initialized }
}

describe("SessionActor", () => {
  describe("cmd/initialize", () => {
    it("should create the live session and publish a pending question", async () => {
      const { actor, cell, initialized } = createSession()

      await actor.whenIdle()

      expect(actor.sessionId).toBe("session-1")
      expect(initialized.current()).toEqual(success(undefined))
      expect(cell.current()).toEqual(pending())
      expect(cell.version).toBe(1)
    })
  })

  describe("cmd/receive-question-list", () => {
    it("should publish the first question of the list", async () => {
      const { actor, cell } = createSession()

      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: QUESTIONS,
      })
      await actor.whenIdle()

      expect(cell.current()).toEqual(success(deriveEphemeralQuestion(QUESTIONS)))
      expect(cell.version).toBe(2)
    })

    it("should not publish again for a list equal to the stored one", async () => {
      const { actor, cell } = createSession()
      const callback = new ResultCell<void>("callback")

      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: QUESTIONS,
      })
      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: copyQuestions(QUESTIONS),
        callback,
      })
      await actor.whenIdle()

      expect(cell.version).toBe(2)
      expect(callback.current()).toEqual(success(undefined))
    })

    it("should report an empty list as a failed question", async () => {
      const { actor, cell } = createSession()

      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: [],
      })
      await actor.whenIdle()

      expect(errorOf(cell.current())?.message).toBe(
        "the survey has no questions to show",
      )
    })
  })

  describe("session identity", () => {
    it("should drop commands for another session", async () => {
      const { actor, cell } = createSession()
      const callback = new ResultCell<void>("callback")

      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-0",
        questionsList: QUESTIONS,
        callback,
      })
      await actor.whenIdle()

      expect(cell.current()).toEqual(pending())
      expect(cell.version).toBe(1)
      expect(callback.version).toBe(0)
      expect(callback.current()).toEqual(pending())
    })

    it("should drop commands that arrive before any session", async () => {
      const actor = new SessionActor({ logger: testLogger })
      const callback = new ResultCell<void>("callback")

      actor.submit({
        type: "cmd/recompute-and-notify",
        sessionId: "session-1",
        callback,
      })
      await actor.whenIdle()

      expect(actor.sessionId).toBeUndefined()
      expect(callback.version).toBe(0)
    })
  })

  describe("failures", () => {
    it("should report reserved commands as unsupported", async () => {
      const { actor } = createSession()
      const callback = new ResultCell<void>("callback")

      actor.submit({
        type: "cmd/submit-answer",
        sessionId: "session-1",
        selectedAnswer: {
          questionName: "nps",
          answer: { type: "nps", score: 9 },
        },
        callback,
      })
      await actor.whenIdle()

      const error = errorOf(callback.current())
      expect(error).toBeInstanceOf(UnsupportedOperationError)
      expect(error?.message).toBe("'cmd/submit-answer' is not implemented yet")
    })

    it("should keep processing after a command fails", async () => {
      const actor = new SessionActor({
        logger: testLogger,
        handlers: {
          ...commandHandlers,
          "cmd/recompute-and-notify": async () => {
            throw new Error("recompute broke")
          },
        },
      })
      const cell = new ResultCell<EphemeralSurveyQuestion>("cell")
      const failed = new ResultCell<void>("failed")

      actor.submit({
        type: "cmd/initialize",
        sessionId: "session-1",
        ephemeralQuestionCell: cell,
        callback: new ResultCell<void>("initialized"),
      })
      actor.submit({
        type: "cmd/recompute-and-notify",
        sessionId: "session-1",
        callback: failed,
      })
      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: QUESTIONS,
      })
      await actor.whenIdle()

      expect(errorOf(failed.current())?.message).toBe("recompute broke")
      expect(cell.current()).toEqual(success(deriveEphemeralQuestion(QUESTIONS)))
    })

    it("should not let a failing command without a callback stop the worker", async () => {
      const actor = new SessionActor({
        logger: testLogger,
        handlers: {
          ...commandHandlers,
          "cmd/save-full-completion": async () => {
            throw new Error("nowhere to report")
          },
        },
      })
      const cell = new ResultCell<EphemeralSurveyQuestion>("cell")
      actor.submit({
        type: "cmd/initialize",
        sessionId: "session-1",
        ephemeralQuestionCell: cell,
        callback: new ResultCell<void>("initialized"),
      })
      actor.submit({ type: "cmd/save-full-completion", sessionId: "session-1" })
      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: QUESTIONS,
      })
      await actor.whenIdle()

      expect(cell.current()).toEqual(success(deriveEphemeralQuestion(QUESTIONS)))
    })
  })

  describe("ordering", () => {
    it("should apply commands from concurrent callers in the order they were accepted", async () => {
      const { actor, cell } = createSession()
      const accepted: string[] = []
      const published: AsyncResult<EphemeralSurveyQuestion>[] = []
      cell.onChange(result => {
        published.push(result)
      })

      await Promise.all(
        [5, 1, 4, 2, 3].map(async (delay, caller) => {
          await new Promise(resolve => setTimeout(resolve, delay))
          const questionsList: SurveyQuestion[] = [
            { questionId: `q-${caller}`, questionName: "nps" },
          ]
          actor.submit({
            type: "cmd/receive-question-list",
            sessionId: "session-1",
            questionsList,
          })
          accepted.push(`q-${caller}`)
        }),
      )
      await actor.whenIdle()

      // The first publication is the pending question of cmd/initialize
      const questionIds = published.flatMap(result =>
        result.status === "success" ? [result.value.question.questionId] : [],
      )
      expect(questionIds).toEqual(accepted)
      expect(published).toHaveLength(accepted.length + 1)
    })
  })

  describe("state changes", () => {
    it("should report the patches of every state transition", async () => {
      const onStateChange = vi.fn()
      const actor = new SessionActor({ logger: testLogger, onStateChange })

      actor.submit({
        type: "cmd/initialize",
        sessionId: "session-1",
        ephemeralQuestionCell: new ResultCell<EphemeralSurveyQuestion>("cell"),
        callback: new ResultCell<void>("initialized"),
      })
      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: QUESTIONS,
      })
      actor.submit({
        type: "cmd/receive-question-list",
        sessionId: "session-1",
        questionsList: copyQuestions(QUESTIONS),
      })
      await actor.whenIdle()

      expect(onStateChange).toHaveBeenCalledTimes(1)
      expect(onStateChange).toHaveBeenCalledWith([
        expect.objectContaining({ path: ["questionsList"] }),
      ])
    })
  })

  describe("close", () => {
    it("should reject commands once closed", () => {
      const { actor } = createSession()

      actor.close()

      expect(actor.isClosed).toBe(true)
      expect(
        actor.submit({ type: "cmd/recompute-and-notify", sessionId: "session-1" }),
      ).toBe(false)
    })
  })
})
