import { ResultCell, success } from "@questline/providers"
import { describe, expect, it } from "vitest"
import type { EphemeralSurveyQuestion } from "../types.js"
import { createMockCommandContext } from "../test-utils.js"
import { handleInitialize } from "./handle-initialize.js"

describe("handleInitialize", () => {
  it("should begin a state for the command's session and cell", async () => {
    const ctx = createMockCommandContext()
    const ephemeralQuestionCell = new ResultCell<EphemeralSurveyQuestion>("cell")
    const callback = new ResultCell<void>("callback")

    await handleInitialize(
      {
        type: "cmd/initialize",
        sessionId: "session-1",
        ephemeralQuestionCell,
        callback,
      },
      ctx,
    )

    expect(ctx.beginState).toHaveBeenCalledWith(
      "session-1",
      ephemeralQuestionCell,
    )
  })

  it("should publish the current question before reporting success", async () => {
    const ctx = createMockCommandContext()
    const callback = new ResultCell<void>("callback")
    let callbackVersionDuringRecompute = -1
    ctx.recomputeAndNotify.mockImplementation(async () => {
      callbackVersionDuringRecompute = callback.version
    })

    await handleInitialize(
      {
        type: "cmd/initialize",
        sessionId: "session-1",
        ephemeralQuestionCell: new ResultCell<EphemeralSurveyQuestion>("cell"),
        callback,
      },
      ctx,
    )

    expect(ctx.recomputeAndNotify).toHaveBeenCalledTimes(1)
    expect(callbackVersionDuringRecompute).toBe(0)
    expect(callback.current()).toEqual(success(undefined))
  })

  it("should leave the callback alone when publishing fails", async () => {
    const ctx = createMockCommandContext()
    const callback = new ResultCell<void>("callback")
    ctx.recomputeAndNotify.mockRejectedValue(new Error("publish failed"))

    await expect(
      handleInitialize(
        {
          type: "cmd/initialize",
          sessionId: "session-1",
          ephemeralQuestionCell: new ResultCell<EphemeralSurveyQuestion>("cell"),
          callback,
        },
        ctx,
      ),
    ).rejects.toThrow("publish failed")
    expect(callback.version).toBe(0)
  })
})
