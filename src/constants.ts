import type { MenuSettings } from "./types"

// Underline length is the title length times this
export const UNDERLINE_MULTIPLIER = 2

export const UNDERLINE_CHAR = "="

// Written before reading the selection
export const PROMPT_MARKER = "\n > "

export const MENU_DEFAULTS: MenuSettings = {
  clearScreen: true,
  pauseOnError: false,
  duplicatePatterns: "allow",
  messages: {
    pause: "Press enter to continue..."
  }
} as const
