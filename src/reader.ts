import { ParseFailure, reportError, UnsupportedKindError } from "./errors"
import type { InputChannel, TextSink } from "./input"
import type {
  BigDecimal,
  NoValue,
  ParsedValue,
  ValueKind,
  ValueOf
} from "./types"

const NONE: NoValue = { kind: "none" }

const INTEGER = /^[+-]?\d+$/
const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/
const MIN_SCALE = -(2 ** 31)
const MAX_SCALE = 2 ** 31 - 1

function toInteger(kind: ValueKind, raw: string, bits: number): number {
  const text = raw.trim()
  if (!INTEGER.test(text)) {
    throw new ParseFailure(kind, raw)
  }

  const max = 2 ** (bits - 1)
  const value = Number(text)
  if (value < -max || value >= max) {
    throw new ParseFailure(kind, raw)
  }
  // Normalises "-0"
  return value + 0
}

function toBigInt(kind: ValueKind, raw: string, bits?: number): bigint {
  const text = raw.trim()
  if (!INTEGER.test(text)) {
    throw new ParseFailure(kind, raw)
  }

  const value = BigInt(text)
  if (bits !== undefined && BigInt.asIntN(bits, value) !== value) {
    throw new ParseFailure(kind, raw)
  }
  return value
}

function matchDecimal(kind: ValueKind, raw: string): RegExpExecArray {
  const match = DECIMAL.exec(raw.trim())
  if (!match || (match[2] === "" && (match[3] ?? "") === "")) {
    throw new ParseFailure(kind, raw)
  }
  return match
}

function toDecimal(kind: ValueKind, raw: string): BigDecimal {
  const [, sign, whole, fraction = "", exponent = "0"] = matchDecimal(kind, raw)

  // Scale is a 32-bit int, as in other decimal types
  const scale = fraction.length - Number(exponent)
  if (!Number.isSafeInteger(scale) || scale < MIN_SCALE || scale > MAX_SCALE) {
    throw new ParseFailure(kind, raw)
  }

  return {
    unscaled: BigInt(`${sign}${whole}${fraction}`),
    scale
  }
}

function toNumber(kind: ValueKind, raw: string): number {
  const text = raw.trim()
  switch (text) {
    case "NaN":
      return Number.NaN
    case "Infinity":
    case "+Infinity":
      return Number.POSITIVE_INFINITY
    case "-Infinity":
      return Number.NEGATIVE_INFINITY
  }

  // Validates the syntax, Number() alone accepts "" and hex
  matchDecimal(kind, text)
  return Number(text)
}

function toBoolean(raw: string): boolean {
  const text = raw.trim().toLowerCase()
  if (text !== "true" && text !== "false") {
    throw new ParseFailure("boolean", raw)
  }
  return text === "true"
}

function convert(kind: ValueKind, raw: string): ParsedValue {
  switch (kind) {
    case "text":
      return { kind, value: raw }
    case "short":
      return { kind, value: toInteger(kind, raw, 16) }
    case "integer":
      return { kind, value: toInteger(kind, raw, 32) }
    case "long":
      return { kind, value: toBigInt(kind, raw, 64) }
    case "bigInteger":
      return { kind, value: toBigInt(kind, raw) }
    case "float":
      return { kind, value: Math.fround(toNumber(kind, raw)) }
    case "double":
      return { kind, value: toNumber(kind, raw) }
    case "bigDecimal":
      return { kind, value: toDecimal(kind, raw) }
    case "boolean":
      return { kind, value: toBoolean(raw) }
    case "byte":
      return { kind, value: toInteger(kind, raw, 8) }
  }
}

const VALUE_KINDS: ReadonlySet<string> = new Set([
  "text",
  "short",
  "integer",
  "long",
  "bigInteger",
  "float",
  "double",
  "bigDecimal",
  "boolean",
  "byte"
] satisfies ValueKind[])

function isValueKind(kind: string): kind is ValueKind {
  return VALUE_KINDS.has(kind)
}

/**
 * Convert raw text to a value of the requested kind, without reporting.
 * Unsupported kinds and malformed text yield `{ kind: "none" }`.
 */
export function parseValue<K extends ValueKind>(
  kind: K,
  raw: string
): ValueOf<K> | NoValue
export function parseValue(kind: string, raw: string): ParsedValue
export function parseValue(kind: string, raw: string): ParsedValue {
  if (!isValueKind(kind)) {
    return NONE
  }

  try {
    return convert(kind, raw)
  } catch (error) {
    if (error instanceof ParseFailure) {
      return NONE
    }
    throw error
  }
}

/**
 * Render a decimal back to plain text, e.g. `{ unscaled: 1250n, scale: 2 }`
 * is "12.50"
 */
export function formatDecimal({ unscaled, scale }: BigDecimal): string {
  const negative = unscaled < 0n
  const digits = (negative ? -unscaled : unscaled).toString()
  const sign = negative ? "-" : ""

  if (scale <= 0) {
    return `${sign}${digits}${"0".repeat(-scale)}`
  }

  const padded = digits.padStart(scale + 1, "0")
  return `${sign}${padded.slice(0, -scale)}.${padded.slice(-scale)}`
}

/**
 * Reads one line per call and converts it to a typed value
 */
export class TypedReader {
  public constructor(
    private readonly input: InputChannel,
    private readonly output: TextSink
  ) {}

  /**
   * Read a line as the given kind, writing `prompt` first when supplied.
   * Malformed input and unsupported kinds are reported and yield
   * `{ kind: "none" }`; input channel failures are rethrown.
   */
  public read<K extends ValueKind>(
    kind: K,
    prompt?: string
  ): Promise<ValueOf<K> | NoValue>
  public read(kind: string, prompt?: string): Promise<ParsedValue>
  public async read(kind: string, prompt?: string): Promise<ParsedValue> {
    if (prompt !== undefined) {
      this.output.write(prompt)
    }

    const line = await this.input.readLine()

    if (!isValueKind(kind)) {
      reportError(new UnsupportedKindError(kind), "reader")
      return NONE
    }

    try {
      return convert(kind, line)
    } catch (error) {
      if (error instanceof ParseFailure) {
        reportError(error, "reader")
        return NONE
      }
      throw error
    }
  }
}
