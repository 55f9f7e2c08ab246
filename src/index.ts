export * from "./constants"
export * from "./discovery"
export * from "./errors"
export * from "./input"
export * from "./menus/console-menu"
export * from "./option"
export * from "./reader"
export * from "./registry"
export * from "./renderer"
export * from "./run-flag"
export * from "./screen"
export * from "./settings"
export type * from "./types"
