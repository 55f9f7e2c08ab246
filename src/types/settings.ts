import type { PartialDeep } from "./utils"

/**
 * How duplicate trigger patterns are treated when an option is registered
 * - 'allow': keep the option, it can never be selected (a warning is logged)
 * - 'reject': throw a DuplicatePatternError
 */
export type DuplicatePatternPolicy = "allow" | "reject"

export interface MenuMessages {
  /** Shown after a reported error when `pauseOnError` is set */
  pause: string
}

export interface MenuSettings {
  /** Clear the terminal before every frame */
  clearScreen: boolean

  /** Wait for a line after reporting an error, before redrawing */
  pauseOnError: boolean

  duplicatePatterns: DuplicatePatternPolicy

  messages: MenuMessages
}

/** What callers can pass: everything optional, deep */
export type MenuUserSettings = PartialDeep<MenuSettings>
