/**
 * Context keys the logger binds as fields. Upstream request handling sets
 * them; `fromContext` reads them.
 */
export const ContextKeys = {
  requestId: "requestID",
  username: "username",
  watcher: "watcher",
} as const

export type ContextKey = (typeof ContextKeys)[keyof typeof ContextKeys]

/**
 * Anything that can look up a value by key: a `Map`, a web framework's
 * request context.
 */
export interface LogContextSource {
  get(key: string): unknown
}

export type LogContextValues = Readonly<Partial<Record<ContextKey, unknown>>>
