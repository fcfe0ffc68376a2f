import { pending, success } from "@questline/providers"
import { describe, expect, it } from "vitest"
import {
  computeCurrentQuestion,
  deriveEphemeralQuestion,
} from "./derive-question.js"
import { EmptyQuestionListError } from "./errors.js"
import { init } from "./session-program.js"
import { errorOf, QUESTIONS } from "./test-utils.js"

describe("deriveEphemeralQuestion", () => {
  it("should wrap the first question with its position", () => {
    expect(deriveEphemeralQuestion(QUESTIONS)).toEqual({
      question: { questionId: "q-user-type", questionName: "user-type" },
      currentQuestionIndex: 0,
      totalQuestionCount: 3,
    })
  })

  it("should show the first question of a single-question survey", () => {
    const [nps] = QUESTIONS.slice(2)

    expect(deriveEphemeralQuestion(QUESTIONS.slice(2))).toEqual({
      question: nps,
      currentQuestionIndex: 0,
      totalQuestionCount: 1,
    })
  })

  it("should throw for an empty list", () => {
    expect(() => deriveEphemeralQuestion([])).toThrow(EmptyQuestionListError)
  })
})

describe("computeCurrentQuestion", () => {
  it("should be pending until the question list arrives", () => {
    expect(computeCurrentQuestion(init("session-1"))).toEqual(pending())
  })

  it("should derive the question once the list is known", () => {
    const model = { sessionId: "session-1", questionsList: QUESTIONS }

    expect(computeCurrentQuestion(model)).toEqual(
      success(deriveEphemeralQuestion(QUESTIONS)),
    )
  })

  it("should report a failed derivation as a failure", () => {
    const model = { sessionId: "session-1", questionsList: [] }

    const error = errorOf(computeCurrentQuestion(model))

    expect(error).toBeInstanceOf(EmptyQuestionListError)
    expect(error?.message).toBe("the survey has no questions to show")
  })
})
