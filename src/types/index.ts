export type * from "./option"
export type * from "./reader"
export type * from "./registry"
export type * from "./settings"
export type * from "./utils"
