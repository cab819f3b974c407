import { Console } from "node:console"
import { type ConsoleTarget, redirectConsole } from "../adapters/console/console-redirect"
import type { LoggerDeps, PinoEngine } from "../adapters/pino/pino-engine"
import { createLogger, type PinoLogger } from "../adapters/pino/pino-logger"
import { LogWriter } from "../adapters/stream/log-writer"
import type { Field } from "../ports/field"
import type { LogContextSource } from "../ports/log-context"
import type { InfoLogger, Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import { newOptions } from "./options"

export type BuildDeps = LoggerDeps & {
  /** The console to redirect. Defaults to the global one. */
  console?: ConsoleTarget
}

// Replaced whole by init(); callers that hold an earlier instance keep using it.
let current: PinoLogger | undefined
let restoreConsole: (() => void) | undefined

function instance(): PinoLogger {
  current ??= createLogger(newOptions())

  return current
}

/**
 * Replaces the default logger.
 *
 * The previous default is not closed, since callers may still hold it; close
 * it with `PinoLogger.close()` once nothing logs through it.
 *
 * @throws {LoggerBuildError} when a sink cannot be opened; the previous
 * default stays in place
 */
export function init(opts: LoggerOptions = newOptions(), deps: LoggerDeps = {}): PinoLogger {
  const next = createLogger(opts, deps)
  current = next

  return next
}

/**
 * Replaces the default logger and routes the console through it. A console
 * redirected by an earlier call is restored first.
 *
 * @throws {LoggerBuildError} when a sink cannot be opened
 */
export function build(opts: LoggerOptions, deps: BuildDeps = {}): PinoLogger {
  const logger = init(opts, deps)

  restoreDefaultConsole()
  restoreConsole = redirectConsole(logger, deps.console)

  return logger
}

/** Undoes the console redirect installed by {@link build}, if any. */
export function restoreDefaultConsole(): void {
  restoreConsole?.()
  restoreConsole = undefined
}

/**
 * The default logger with the context values of `ctx` bound, or of the
 * current async context when `ctx` is omitted.
 */
export function l(ctx?: LogContextSource): Logger {
  return instance().fromContext(ctx)
}

export function engine(): PinoEngine {
  return instance().engine()
}

/** A `Console` whose output becomes info records of the current default. */
export function stdInfoLogger(): Console {
  const writer = new LogWriter(instance(), "info")

  return new Console({ stdout: writer, stderr: writer })
}

/** A `Console` whose output becomes error records of the current default. */
export function stdErrorLogger(): Console {
  const writer = new LogWriter(instance(), "error")

  return new Console({ stdout: writer, stderr: writer })
}

export function debug(message: string, ...fields: Field[]): void {
  instance().debug(message, ...fields)
}

export function debugf(template: string, ...args: unknown[]): void {
  instance().debugf(template, ...args)
}

export function debugw(message: string, ...keysAndValues: unknown[]): void {
  instance().debugw(message, ...keysAndValues)
}

export function info(message: string, ...fields: Field[]): void {
  instance().info(message, ...fields)
}

export function infof(template: string, ...args: unknown[]): void {
  instance().infof(template, ...args)
}

export function infow(message: string, ...keysAndValues: unknown[]): void {
  instance().infow(message, ...keysAndValues)
}

export function warn(message: string, ...fields: Field[]): void {
  instance().warn(message, ...fields)
}

export function warnf(template: string, ...args: unknown[]): void {
  instance().warnf(template, ...args)
}

export function warnw(message: string, ...keysAndValues: unknown[]): void {
  instance().warnw(message, ...keysAndValues)
}

export function error(message: string, ...fields: Field[]): void {
  instance().error(message, ...fields)
}

export function errorf(template: string, ...args: unknown[]): void {
  instance().errorf(template, ...args)
}

export function errorw(message: string, ...keysAndValues: unknown[]): void {
  instance().errorw(message, ...keysAndValues)
}

export function panic(message: string, ...fields: Field[]): never {
  return instance().panic(message, ...fields)
}

export function panicf(template: string, ...args: unknown[]): never {
  return instance().panicf(template, ...args)
}

export function panicw(message: string, ...keysAndValues: unknown[]): never {
  return instance().panicw(message, ...keysAndValues)
}

export function fatal(message: string, ...fields: Field[]): void {
  instance().fatal(message, ...fields)
}

export function fatalf(template: string, ...args: unknown[]): void {
  instance().fatalf(template, ...args)
}

export function fatalw(message: string, ...keysAndValues: unknown[]): void {
  instance().fatalw(message, ...keysAndValues)
}

export function v(level: number): InfoLogger {
  return instance().v(level)
}

export function write(chunk: string | Uint8Array): number {
  return instance().write(chunk)
}

export function withValues(...keysAndValues: unknown[]): Logger {
  return instance().withValues(...keysAndValues)
}

export function withName(name: string): Logger {
  return instance().withName(name)
}

export function flush(): Promise<void> {
  return instance().flush()
}
