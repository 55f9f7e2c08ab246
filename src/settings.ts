import lodash from "lodash"
import { MENU_DEFAULTS } from "./constants"
import type { MenuSettings, MenuUserSettings } from "./types"

/**
 * Merge user settings over a fresh copy of the defaults
 */
export function resolveSettings(settings?: MenuUserSettings): MenuSettings {
  return lodash.merge({}, MENU_DEFAULTS, settings)
}
