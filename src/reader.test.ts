import { Logger } from "commandkit"
import { describe, expect, it } from "vitest"
import { InputClosedError } from "./errors"
import { formatDecimal, parseValue, TypedReader } from "./reader"
import { OutputBuffer, ScriptedInput } from "./test-helpers"

describe("parseValue", () => {
  it("reads integers within 32 bits", () => {
    expect(parseValue("integer", "42")).toEqual({ kind: "integer", value: 42 })
    expect(parseValue("integer", " -7 ")).toEqual({ kind: "integer", value: -7 })
    expect(parseValue("integer", "2147483647")).toEqual({
      kind: "integer",
      value: 2147483647
    })
    expect(parseValue("integer", "2147483648")).toEqual({ kind: "none" })
    expect(parseValue("integer", "abc")).toEqual({ kind: "none" })
    expect(parseValue("integer", "4.2")).toEqual({ kind: "none" })
  })

  it("bounds short and byte values", () => {
    expect(parseValue("short", "-32768")).toEqual({ kind: "short", value: -32768 })
    expect(parseValue("short", "32768")).toEqual({ kind: "none" })
    expect(parseValue("byte", "127")).toEqual({ kind: "byte", value: 127 })
    expect(parseValue("byte", "128")).toEqual({ kind: "none" })
  })

  it("reads long and unbounded integers as bigint", () => {
    expect(parseValue("long", "9223372036854775807")).toEqual({
      kind: "long",
      value: 9223372036854775807n
    })
    expect(parseValue("long", "9223372036854775808")).toEqual({ kind: "none" })
    expect(parseValue("bigInteger", "123456789012345678901234567890")).toEqual({
      kind: "bigInteger",
      value: 123456789012345678901234567890n
    })
  })

  it("reads floating point numbers", () => {
    expect(parseValue("double", "1e3")).toEqual({ kind: "double", value: 1000 })
    expect(parseValue("double", "-.25")).toEqual({ kind: "double", value: -0.25 })
    expect(parseValue("double", "NaN")).toEqual({ kind: "double", value: Number.NaN })
    expect(parseValue("double", "0x10")).toEqual({ kind: "none" })
    expect(parseValue("double", "")).toEqual({ kind: "none" })
    expect(parseValue("float", "0.1")).toEqual({
      kind: "float",
      value: Math.fround(0.1)
    })
  })

  it("reads arbitrary-precision decimals", () => {
    expect(parseValue("bigDecimal", "12.50")).toEqual({
      kind: "bigDecimal",
      value: { unscaled: 1250n, scale: 2 }
    })
    expect(parseValue("bigDecimal", "-.5")).toEqual({
      kind: "bigDecimal",
      value: { unscaled: -5n, scale: 1 }
    })
    expect(parseValue("bigDecimal", "1e3")).toEqual({
      kind: "bigDecimal",
      value: { unscaled: 1n, scale: -3 }
    })
    expect(parseValue("bigDecimal", ".")).toEqual({ kind: "none" })
  })

  it("rejects decimals whose scale does not fit 32 bits", () => {
    expect(parseValue("bigDecimal", "1e99999999999999999999")).toEqual({
      kind: "none"
    })
    expect(parseValue("bigDecimal", "1e2147483649")).toEqual({ kind: "none" })
    expect(parseValue("bigDecimal", "1e-2147483648")).toEqual({ kind: "none" })
    expect(parseValue("bigDecimal", "1e-2147483647")).toEqual({
      kind: "bigDecimal",
      value: { unscaled: 1n, scale: 2147483647 }
    })
  })

  it("still reads huge exponents as floating point", () => {
    expect(parseValue("double", "1e99999999999999999999")).toEqual({
      kind: "double",
      value: Number.POSITIVE_INFINITY
    })
  })

  it("reads booleans case-insensitively", () => {
    expect(parseValue("boolean", "TRUE")).toEqual({ kind: "boolean", value: true })
    expect(parseValue("boolean", " false")).toEqual({ kind: "boolean", value: false })
    expect(parseValue("boolean", "yes")).toEqual({ kind: "none" })
  })

  it("keeps empty text distinct from no value", () => {
    expect(parseValue("text", "")).toEqual({ kind: "text", value: "" })
    expect(parseValue("text", "  padded ")).toEqual({
      kind: "text",
      value: "  padded "
    })
  })

  it("yields no value for unsupported kinds", () => {
    expect(parseValue("date", "2024-01-01")).toEqual({ kind: "none" })
  })
})

describe("formatDecimal", () => {
  it("places the decimal point by scale", () => {
    expect(formatDecimal({ unscaled: 1250n, scale: 2 })).toBe("12.50")
    expect(formatDecimal({ unscaled: -5n, scale: 1 })).toBe("-0.5")
    expect(formatDecimal({ unscaled: 5n, scale: 3 })).toBe("0.005")
    expect(formatDecimal({ unscaled: 1n, scale: -3 })).toBe("1000")
  })
})

describe("TypedReader", () => {
  it("writes the prompt and converts the line", async () => {
    const output = new OutputBuffer()
    const reader = new TypedReader(new ScriptedInput(["42"]), output)

    await expect(reader.read("integer", "Age: ")).resolves.toEqual({
      kind: "integer",
      value: 42
    })
    expect(output.text).toBe("Age: ")
  })

  it("reports malformed input and yields no value", async () => {
    const reader = new TypedReader(new ScriptedInput(["abc"]), new OutputBuffer())

    await expect(reader.read("integer")).resolves.toEqual({ kind: "none" })
    expect(Logger.error).toHaveBeenCalledTimes(1)
    expect(Logger.error).toHaveBeenCalledWith('[reader] Cannot read "abc" as integer')
  })

  it("reports unsupported kinds and consumes a line", async () => {
    const reader = new TypedReader(
      new ScriptedInput(["2024-01-01", "next"]),
      new OutputBuffer()
    )

    await expect(reader.read("date")).resolves.toEqual({ kind: "none" })
    await expect(reader.read("text")).resolves.toEqual({ kind: "text", value: "next" })
    expect(Logger.error).toHaveBeenCalledTimes(1)
    expect(Logger.error).toHaveBeenCalledWith('[reader] Unsupported value kind "date"')
  })

  it("rethrows end of input", async () => {
    const reader = new TypedReader(new ScriptedInput([]), new OutputBuffer())

    await expect(reader.read("text")).rejects.toBeInstanceOf(InputClosedError)
  })
})
