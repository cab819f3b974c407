import { format } from "node:util"
import type { Logger } from "../../ports/logger"

export type ConsoleMethod = "log" | "info" | "debug" | "warn" | "error"

export type ConsoleTarget = Pick<Console, ConsoleMethod>

const consoleMethods: readonly ConsoleMethod[] = ["log", "info", "debug", "warn", "error"]

const routes = {
  log: "info",
  info: "info",
  debug: "debug",
  warn: "warn",
  error: "error",
} as const satisfies Record<ConsoleMethod, keyof Logger>

/**
 * Replaces the console's printing methods with ones that log through
 * `logger`, each call formatted like `console.log` would. Returns a function
 * that puts the original methods back.
 */
export function redirectConsole(logger: Logger, target: ConsoleTarget = console): () => void {
  const saved = pickMethods(target)

  for (const method of consoleMethods) {
    const severity = routes[method]

    target[method] = (...args: unknown[]) => {
      logger[severity](format(...args))
    }
  }

  return () => {
    Object.assign(target, saved)
  }
}

function pickMethods(target: ConsoleTarget): ConsoleTarget {
  return {
    log: target.log,
    info: target.info,
    debug: target.debug,
    warn: target.warn,
    error: target.error,
  }
}
