import type { Option } from "../option"
import type { FallbackHandler } from "../discovery"

/**
 * Option registry interface
 * Ordered storage for the options of one menu
 */
export interface IOptionRegistry {
  /**
   * Append an option (insertion order is render order)
   */
  add(option: Option): void

  /**
   * Remove an option, by value or by position
   */
  remove(option: Option | number): Option | undefined

  /**
   * Get the option at a position
   */
  get(index: number): Option | undefined

  /**
   * Find the first option whose pattern equals the input
   */
  match(pattern: string): Option | undefined

  /**
   * Get all options in render order
   */
  getAll(): Option[]

  /**
   * Set the unknown-input fallback, at most once
   */
  setFallback(handler: FallbackHandler): void

  /**
   * Get the unknown-input fallback, if any
   */
  getFallback(): FallbackHandler | undefined

  /**
   * Number of registered options
   */
  readonly size: number

  /**
   * Clear all options and the fallback (useful for testing)
   */
  clear(): void
}
