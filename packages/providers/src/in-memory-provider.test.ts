import { describe, expect, it, vi } from "vitest"
import { success } from "./async-result.js"
import { createInMemoryDataProvider } from "./in-memory-provider.js"

describe("InMemoryDataProvider", () => {
  it("should hold its initial value as a success", () => {
    const provider = createInMemoryDataProvider("questions", ["a", "b"])

    expect(provider.current()).toEqual(success(["a", "b"]))
  })

  it("should notify listeners on every setValue, even for an equal value", async () => {
    const provider = createInMemoryDataProvider("count", 1)
    const listener = vi.fn()
    provider.onChange(listener)

    await provider.setValue(1)
    await provider.setValue(2)

    expect(listener).toHaveBeenCalledTimes(2)
    expect(listener).toHaveBeenLastCalledWith(success(2))
    expect(provider.version).toBe(2)
  })
})
