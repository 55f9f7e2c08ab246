import { PROMPT_MARKER, UNDERLINE_CHAR, UNDERLINE_MULTIPLIER } from "./constants"
import type { Option } from "./option"

export type RenderableOption = Pick<Option, "name" | "pattern">

/**
 * Underline for a title: `=` repeated UNDERLINE_MULTIPLIER times its length
 * in code points
 */
export function createUnderline(title: string): string {
  return UNDERLINE_CHAR.repeat([...title].length * UNDERLINE_MULTIPLIER)
}

/**
 * Format the menu header and option list. The prompt marker is not part of
 * the frame; the reader writes it when asking for the selection.
 *
 * ```
 *
 *  TITLE
 *  ==========
 *    (h) Help
 * ```
 */
export function renderMenu(
  title: string,
  options: readonly RenderableOption[],
  underline = createUnderline(title)
): string {
  let text = `\n ${title}\n ${underline}\n`

  for (const option of options) {
    text += `   (${option.pattern}) ${option.name}\n`
  }

  return text
}

/**
 * The full frame as it appears on screen before input
 */
export function renderFrame(
  title: string,
  options: readonly RenderableOption[],
  underline = createUnderline(title)
): string {
  return renderMenu(title, options, underline) + PROMPT_MARKER
}
