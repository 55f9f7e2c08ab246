/** A value, or a promise of one */
export type Awaitable<T> = T | Promise<T>

/** What callers can pass: everything optional, deep */
export type PartialDeep<T> = {
  [K in keyof T]?: T[K] extends object ? PartialDeep<T[K]> : T[K]
}
