import type { InputChannel } from "../input"
import type { RunFlag } from "../run-flag"
import type { Awaitable } from "./utils"

/**
 * Arguments a handler can ask for, in declaration order
 * - 'runFlag': the session's mutable run flag
 * - 'input': the raw input channel
 */
export type ParameterKind = "runFlag" | "input"

/**
 * Declared return kind of a handler. Boolean handlers stop the loop by
 * returning `true`.
 */
export type ReturnKind = "void" | "boolean"

/**
 * Any method that can be tagged as a handler
 */
export type HandlerMethod = (...args: never[]) => Awaitable<boolean | void>

export type HandlerArgument = RunFlag | InputChannel

/**
 * Attributes of the `@menuOption` tag
 */
export interface OptionDefinition {
  /** Name shown in the menu */
  name: string

  /** Exact text the user types to select the option */
  pattern: string

  /** Arguments passed to the handler, in order (default: none) */
  params?: ParameterKind[]

  /** Declared return kind (default: 'void') */
  returns?: ReturnKind
}

/**
 * What the loop does after an option ran
 */
export type InvocationOutcome =
  | { kind: "signal"; stop: boolean }
  | { kind: "continue" }

/**
 * Values the engine can hand to a handler
 */
export interface InvocationContext {
  runFlag: RunFlag
  input: InputChannel
}
