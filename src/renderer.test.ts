import { describe, expect, it } from "vitest"
import { createUnderline, renderFrame, renderMenu } from "./renderer"

const options = [
  { name: "Help", pattern: "h" },
  { name: "Quit", pattern: "q" }
]

describe("createUnderline", () => {
  it("is twice the title length", () => {
    expect(createUnderline("MY COOL CLI APP")).toBe("=".repeat(30))
  })

  it("counts code points, not UTF-16 units", () => {
    expect(createUnderline("🍕 menu")).toBe("=".repeat(12))
  })
})

describe("renderMenu", () => {
  it("lists options in insertion order under the title", () => {
    expect(renderMenu("MENU", options)).toBe(
      "\n MENU\n ========\n   (h) Help\n   (q) Quit\n"
    )
  })

  it("renders a header alone when there are no options", () => {
    expect(renderMenu("MENU", [])).toBe("\n MENU\n ========\n")
  })

  it("reuses a precomputed underline", () => {
    expect(renderMenu("MENU", [], "--")).toBe("\n MENU\n --\n")
  })
})

describe("renderFrame", () => {
  it("ends with a blank line and the prompt marker", () => {
    expect(renderFrame("MENU", options)).toBe(
      "\n MENU\n ========\n   (h) Help\n   (q) Quit\n\n > "
    )
  })
})
