import { AsyncLocalStorage } from "node:async_hooks"
import type { Field } from "../ports/field"
import { ContextKeys, type LogContextSource, type LogContextValues } from "../ports/log-context"
import { field } from "./fields"

const storage = new AsyncLocalStorage<LogContextSource>()

const contextOrder = [ContextKeys.requestId, ContextKeys.username, ContextKeys.watcher]

/**
 * Fields for the well-known keys present in `ctx`, in a fixed order.
 */
export function contextFields(ctx: LogContextSource | undefined): Field[] {
  if (!ctx) return []

  const fields: Field[] = []

  for (const key of contextOrder) {
    const value = ctx.get(key)
    if (value !== undefined && value !== null) fields.push(field.any(key, value))
  }

  return fields
}

/**
 * Runs `fn` with `values` as the current log context.
 *
 * @example
 * ```ts
 * runWithLogContext({ requestID: req.id }, () => handle(req))
 * ```
 */
export function runWithLogContext<T>(values: LogContextValues | LogContextSource, fn: () => T): T {
  return storage.run(toSource(values), fn)
}

export function currentLogContext(): LogContextSource | undefined {
  return storage.getStore()
}

function isSource(values: LogContextValues | LogContextSource): values is LogContextSource {
  return "get" in values && typeof values.get === "function"
}

function toSource(values: LogContextValues | LogContextSource): LogContextSource {
  if (isSource(values)) return values

  const map = new Map<string, unknown>(Object.entries(values))

  return { get: (key) => map.get(key) }
}
