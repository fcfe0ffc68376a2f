import { describe, expect, it } from "vitest"
import { generateSessionId } from "./generate-session-id.js"

describe("generateSessionId", () => {
  it("should mint a new UUID every time", () => {
    const first = generateSessionId()
    const second = generateSessionId()

    expect(first).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    )
    expect(second).not.toBe(first)
  })
})
