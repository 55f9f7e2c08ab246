import { Logger } from "commandkit"
import {
  DuplicateFallbackHandlerError,
  MenuConfigurationError
} from "./errors"
import { Option } from "./option"
import type { HandlerMethod, OptionDefinition } from "./types"

/**
 * The handler invoked when input matches no option
 */
export interface FallbackHandler {
  key: string
  handler: HandlerMethod
}

type HandlerDeclaration =
  | { tag: "option"; key: string; handler: HandlerMethod; definition: OptionDefinition }
  | { tag: "fallback"; key: string; handler: HandlerMethod }

export interface DiscoveredHandlers {
  options: readonly Option[]
  fallback?: FallbackHandler
}

// Declarations per class prototype, in source order
const declarations = new WeakMap<object, HandlerDeclaration[]>()

const discovered = new WeakMap<object, Readonly<DiscoveredHandlers>>()

function declare(target: object, declaration: HandlerDeclaration): void {
  const list = declarations.get(target)
  if (list) {
    list.push(declaration)
  } else {
    declarations.set(target, [declaration])
  }
}

function keyName(key: string | symbol): string {
  return typeof key === "symbol" ? (key.description ?? "symbol") : key
}

/**
 * Tag a method as a selectable menu option
 *
 * @example
 * ```ts
 * class App extends ConsoleMenu {
 *   @menuOption({ name: "Quit", pattern: "q", returns: "boolean" })
 *   quit(): boolean {
 *     return true
 *   }
 * }
 * ```
 */
export function menuOption(definition: OptionDefinition) {
  return <T extends HandlerMethod>(
    target: object,
    key: string | symbol,
    descriptor: TypedPropertyDescriptor<T>
  ): void => {
    const handler = descriptor.value
    if (!handler) {
      throw new MenuConfigurationError(
        `@menuOption can only tag methods, "${keyName(key)}" is not one`
      )
    }

    declare(target, { tag: "option", key: keyName(key), handler, definition })
  }
}

/**
 * Tag a method as the handler for input that matches no option.
 * At most one method of a menu may carry it.
 */
export function onUnknownInput() {
  return <T extends HandlerMethod>(
    target: object,
    key: string | symbol,
    descriptor: TypedPropertyDescriptor<T>
  ): void => {
    const handler = descriptor.value
    if (!handler) {
      throw new MenuConfigurationError(
        `@onUnknownInput can only tag methods, "${keyName(key)}" is not one`
      )
    }

    declare(target, { tag: "fallback", key: keyName(key), handler })
  }
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0
}

function scan(prototype: object): DiscoveredHandlers {
  const options: Option[] = []
  let fallback: FallbackHandler | undefined

  for (const declaration of declarations.get(prototype) ?? []) {
    if (declaration.tag === "fallback") {
      if (fallback) {
        throw new DuplicateFallbackHandlerError(fallback.key, declaration.key)
      }

      fallback = { key: declaration.key, handler: declaration.handler }
      continue
    }

    const { name, pattern, params, returns } = declaration.definition
    if (!isNonEmptyString(name) || !isNonEmptyString(pattern)) {
      throw new MenuConfigurationError(
        `@menuOption on "${declaration.key}" needs a non-empty name and pattern`
      )
    }

    options.push(
      new Option({ name, pattern, handler: declaration.handler, params, returns })
    )
  }

  return { options, fallback }
}

/**
 * Collect the tagged handlers declared directly on `prototype`. Handlers of
 * parent classes are not considered. Results are cached per prototype.
 */
export function discoverHandlers(prototype: object): Readonly<DiscoveredHandlers> {
  const cached = discovered.get(prototype)
  if (cached) {
    return cached
  }

  const result = Object.freeze(scan(prototype))
  discovered.set(prototype, result)

  Logger.debug(
    `Discovered ${result.options.length} option(s)${result.fallback ? ` and fallback "${result.fallback.key}"` : ""}`
  )

  return result
}
