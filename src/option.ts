import { InputClosedError, InvocationError } from "./errors"
import type {
  HandlerArgument,
  HandlerMethod,
  InvocationContext,
  InvocationOutcome,
  ParameterKind,
  ReturnKind
} from "./types"

export interface OptionInit {
  name: string
  pattern: string
  handler: HandlerMethod
  params?: readonly ParameterKind[]
  returns?: ReturnKind
}

/**
 * Build the argument list for a handler from its declared parameter kinds
 */
export function resolveArguments(
  kinds: readonly string[],
  context: InvocationContext,
  owner = "handler"
): HandlerArgument[] {
  return kinds.map(kind => {
    switch (kind) {
      case "runFlag":
        return context.runFlag
      case "input":
        return context.input
      default:
        throw new InvocationError(
          `${owner} requested unsupported parameter kind "${kind}"`
        )
    }
  })
}

/**
 * Call a handler with `target` as `this`, wrapping anything it throws.
 * End of input passes through untouched so the loop can stop.
 */
export async function callHandler(
  handler: HandlerMethod,
  target: object,
  args: HandlerArgument[],
  owner: string
): Promise<unknown> {
  try {
    return await Reflect.apply(handler, target, args)
  } catch (error) {
    if (error instanceof InputClosedError || error instanceof InvocationError) {
      throw error
    }
    throw new InvocationError(`${owner} failed`, { cause: error })
  }
}

/**
 * One selectable entry of a menu. Immutable.
 */
export class Option {
  public readonly name: string
  public readonly pattern: string
  public readonly handler: HandlerMethod
  public readonly params: readonly ParameterKind[]
  public readonly returns: ReturnKind

  // Chosen once from the declared return kind
  private readonly interpret: (result: unknown) => InvocationOutcome

  public constructor(init: OptionInit) {
    this.name = init.name
    this.pattern = init.pattern
    this.handler = init.handler
    this.params = Object.freeze([...(init.params ?? [])])
    this.returns = init.returns ?? "void"

    this.interpret =
      this.returns === "boolean"
        ? result => {
            if (typeof result !== "boolean") {
              throw new InvocationError(
                `${this.describe()} must return a boolean, got ${typeof result}`
              )
            }
            return { kind: "signal", stop: result }
          }
        : () => ({ kind: "continue" })

    Object.freeze(this)
  }

  /**
   * Invoke the handler on `target` with the arguments its parameters ask for
   */
  public async invoke(
    target: object,
    context: InvocationContext
  ): Promise<InvocationOutcome> {
    const owner = this.describe()
    const args = resolveArguments(this.params, context, owner)
    const result = await callHandler(this.handler, target, args, owner)
    return this.interpret(result)
  }

  public equals(other: Option): boolean {
    return (
      this.name === other.name &&
      this.pattern === other.pattern &&
      this.handler === other.handler
    )
  }

  public toString(): string {
    return `Option{name='${this.name}', pattern='${this.pattern}', handler=${this.handler.name || "anonymous"}}`
  }

  private describe(): string {
    return `Option "${this.name}" (${this.pattern})`
  }
}
