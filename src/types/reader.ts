/**
 * Arbitrary-precision decimal, `unscaled × 10^-scale`
 */
export interface BigDecimal {
  unscaled: bigint
  scale: number
}

/**
 * Tagged result of reading one line, keyed by the requested kind
 */
export interface ParsedValues {
  text: string
  short: number
  integer: number
  long: bigint
  bigInteger: bigint
  float: number
  double: number
  bigDecimal: BigDecimal
  boolean: boolean
  byte: number
}

/**
 * Kinds the reader can convert a line into
 */
export type ValueKind = keyof ParsedValues

/**
 * A successfully converted value of the given kind
 */
export type ValueOf<K extends ValueKind> = {
  [Kind in K]: { kind: Kind; value: ParsedValues[Kind] }
}[K]

/**
 * No value was obtained: the line did not parse, or the kind is unsupported
 */
export interface NoValue {
  kind: "none"
}

export type ParsedValue = ValueOf<ValueKind> | NoValue
