import { Logger } from "commandkit"

/**
 * Base class for every error raised by a menu
 */
export class MenuError extends Error {
  public constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A second `@onUnknownInput` handler was found. The menu is never usable.
 */
export class DuplicateFallbackHandlerError extends MenuError {
  public constructor(existing: string, duplicate: string) {
    super(
      `Only one @onUnknownInput handler is possible: "${existing}" is already bound, found "${duplicate}"`
    )
  }
}

/**
 * Two options share a trigger pattern and the menu rejects duplicates
 */
export class DuplicatePatternError extends MenuError {
  public constructor(pattern: string, existing: string, duplicate: string) {
    super(
      `Pattern "${pattern}" of option "${duplicate}" is already used by "${existing}"`
    )
  }
}

/**
 * A tagged handler is declared with invalid attributes
 */
export class MenuConfigurationError extends MenuError {}

/**
 * A handler threw, asked for an unknown argument, or returned the wrong kind
 */
export class InvocationError extends MenuError {}

/**
 * A line could not be converted to the requested kind
 */
export class ParseFailure extends MenuError {
  public constructor(
    public readonly kind: string,
    public readonly input: string
  ) {
    super(`Cannot read "${input}" as ${kind}`)
  }
}

/**
 * The reader was asked for a kind it cannot produce
 */
export class UnsupportedKindError extends MenuError {
  public constructor(public readonly kind: string) {
    super(`Unsupported value kind "${kind}"`)
  }
}

/**
 * The input channel or the screen-clear process failed
 */
export class IOFailure extends MenuError {}

/**
 * The input channel reached end of stream or was closed
 */
export class InputClosedError extends IOFailure {
  public constructor() {
    super("Input channel is closed")
  }
}

function describe(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }

  if (error instanceof MenuError && error.cause !== undefined) {
    return `${error.message}: ${describe(error.cause)}`
  }

  return error.message
}

/**
 * Report a runtime error with the place it came from
 */
export function reportError(error: unknown, origin: string): void {
  Logger.error(`[${origin}] ${describe(error)}`)
}
