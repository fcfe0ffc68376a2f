import { ResultCell } from "@questline/providers"
import { describe, expect, it } from "vitest"
import { UNSUPPORTED_COMMAND_TYPES } from "../commands.js"
import { UnsupportedOperationError } from "../errors.js"
import { handleUnsupported } from "./handle-unsupported.js"
import { commandHandlers } from "./index.js"

describe("handleUnsupported", () => {
  it("should throw an UnsupportedOperationError naming the command", async () => {
    const result = handleUnsupported({
      type: "cmd/move-to-next-question",
      sessionId: "session-1",
      callback: new ResultCell<void>("callback"),
    })

    await expect(result).rejects.toBeInstanceOf(UnsupportedOperationError)
    await expect(result).rejects.toMatchObject({
      code: "NOT_IMPLEMENTED",
      commandType: "cmd/move-to-next-question",
      message: "'cmd/move-to-next-question' is not implemented yet",
    })
  })

  it("should be registered for every reserved command", () => {
    for (const type of UNSUPPORTED_COMMAND_TYPES) {
      expect(commandHandlers[type]).toBe(handleUnsupported)
    }
  })
})
