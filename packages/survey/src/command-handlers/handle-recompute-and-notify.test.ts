import { ResultCell, success } from "@questline/providers"
import { describe, expect, it } from "vitest"
import { createMockCommandContext } from "../test-utils.js"
import { handleRecomputeAndNotify } from "./handle-recompute-and-notify.js"

describe("handleRecomputeAndNotify", () => {
  it("should recompute and then report success", async () => {
    const ctx = createMockCommandContext()
    const callback = new ResultCell<void>("callback")

    await handleRecomputeAndNotify(
      { type: "cmd/recompute-and-notify", sessionId: "session-1", callback },
      ctx,
    )

    expect(ctx.recomputeAndNotify).toHaveBeenCalledTimes(1)
    expect(callback.current()).toEqual(success(undefined))
  })
})
