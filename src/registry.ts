import { Logger } from "commandkit"
import type { FallbackHandler } from "./discovery"
import { DuplicateFallbackHandlerError, DuplicatePatternError } from "./errors"
import type { Option } from "./option"
import type { DuplicatePatternPolicy, IOptionRegistry } from "./types"

/**
 * Option registry implementation
 * Stores the options of one menu in insertion order
 */
export class OptionRegistry implements IOptionRegistry {
  /** Registered options, render order */
  private options: Option[] = []

  /** Unknown-input handler */
  private fallback?: FallbackHandler

  public constructor(
    private readonly duplicatePatterns: DuplicatePatternPolicy = "allow"
  ) {}

  public add(option: Option): void {
    const existing = this.match(option.pattern)
    if (existing) {
      if (this.duplicatePatterns === "reject") {
        throw new DuplicatePatternError(option.pattern, existing.name, option.name)
      }

      // First match wins, so this one can never be selected
      Logger.warn(
        `Duplicate pattern "${option.pattern}": option "${option.name}" is unreachable`
      )
    }

    this.options.push(option)
    Logger.debug(`Registered option: (${option.pattern}) ${option.name}`)
  }

  public remove(option: Option | number): Option | undefined {
    const index =
      typeof option === "number"
        ? option
        : this.options.findIndex(o => o.equals(option))

    if (!Number.isInteger(index) || index < 0 || index >= this.options.length) {
      return undefined
    }

    const [removed] = this.options.splice(index, 1)
    return removed
  }

  public get(index: number): Option | undefined {
    return this.options[index]
  }

  public match(pattern: string): Option | undefined {
    return this.options.find(o => o.pattern === pattern)
  }

  public getAll(): Option[] {
    return [...this.options]
  }

  public setFallback(handler: FallbackHandler): void {
    if (this.fallback) {
      throw new DuplicateFallbackHandlerError(this.fallback.key, handler.key)
    }

    this.fallback = handler
  }

  public getFallback(): FallbackHandler | undefined {
    return this.fallback
  }

  public get size(): number {
    return this.options.length
  }

  public clear(): void {
    this.options = []
    this.fallback = undefined
    Logger.debug("Cleared all options")
  }
}
