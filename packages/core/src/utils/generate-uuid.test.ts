import { afterEach, describe, expect, it, vi } from "vitest"
import { generateUUID } from "./generate-uuid.js"

const uuidV4 =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe("generateUUID", () => {
  afterEach(() => {
    vi.restoreAllMocks()
    vi.unstubAllGlobals()
  })

  it("returns a UUID v4", () => {
    expect(generateUUID()).toMatch(uuidV4)
  })

  it("generates unique ids", () => {
    const ids = new Set<string>()
    for (let i = 0; i < 100; i++) {
      ids.add(generateUUID())
    }
    expect(ids.size).toBe(100)
  })

  it("uses crypto.randomUUID when available", () => {
    const randomUUID = vi
      .spyOn(crypto, "randomUUID")
      .mockReturnValue("12345678-1234-4123-8123-123456789abc")

    expect(generateUUID()).toBe("12345678-1234-4123-8123-123456789abc")
    expect(randomUUID).toHaveBeenCalledTimes(1)
  })

  it("falls back to getRandomValues without randomUUID", () => {
    vi.stubGlobal("crypto", {
      getRandomValues: (array: Uint8Array) => array.fill(0xff),
    })

    expect(generateUUID()).toBe("efffffff-efff-4fff-bfff-efffffffffff")
  })
})
