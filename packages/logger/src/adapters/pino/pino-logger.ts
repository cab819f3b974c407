import { format } from "node:util"
import { callerLocation, callerStack } from "../../core/caller"
import { contextFields, currentLogContext } from "../../core/context"
import { PanicError } from "../../core/errors"
import { encodeFields } from "../../core/fields"
import { keyValuesToFields } from "../../core/key-values"
import { isAtLeast, severityForVerbosity } from "../../core/levels"
import type { Field } from "../../ports/field"
import { Verbosity, type Severity } from "../../ports/log-level"
import type { LogContextSource } from "../../ports/log-context"
import type { InfoLogger, Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"
import { disabledInfoLogger } from "../null/null-logger"
import {
  createEngineState,
  type EngineState,
  flushSinks,
  flushSinksSync,
  type LoggerDeps,
  type PinoEngine,
} from "./pino-engine"

const decoder = new TextDecoder()

function joinName(parent: string, name: string): string {
  if (name === "") return parent
  if (parent === "") return name

  return `${parent}.${name}`
}

/**
 * One logger's view of the shared engine: its bound fields (held by the pino
 * child) and its name.
 */
class LogCore {
  constructor(
    readonly state: EngineState,
    private readonly engine: PinoEngine,
    readonly name: string,
  ) {}

  enabled(severity: Severity): boolean {
    return isAtLeast(severity, this.state.threshold)
  }

  log(severity: Severity, message: string, fields: readonly Field[]): void {
    if (!this.enabled(severity)) return

    this.emit(severity, message, fields)
  }

  logf(severity: Severity, template: string, args: readonly unknown[]): void {
    if (!this.enabled(severity)) return

    this.emit(severity, format(template, ...args), [])
  }

  logw(severity: Severity, message: string, keysAndValues: readonly unknown[]): void {
    if (!this.enabled(severity)) return

    this.emit(severity, message, this.toFields(keysAndValues))
  }

  toFields(keysAndValues: readonly unknown[]): Field[] {
    return keyValuesToFields(keysAndValues, (message, detail) => this.log("dpanic", message, [detail]))
  }

  derive(fields: readonly Field[], name = this.name): LogCore {
    const engine = fields.length > 0 ? this.engine.child(encodeFields(fields)) : this.engine

    return new LogCore(this.state, engine, name)
  }

  panic(message: string): never {
    flushSinksSync(this.state)
    throw new PanicError(message)
  }

  fatal(): void {
    flushSinksSync(this.state)
    this.state.exit(1)
  }

  get pino(): PinoEngine {
    return this.engine
  }

  private emit(severity: Severity, message: string, fields: readonly Field[]): void {
    if (!this.state.sampler.allow(severity, message)) return

    const { disableCaller, disableStacktrace, development } = this.state.options
    const record: Record<string, unknown> = {}

    if (this.name !== "") record.logger = this.name

    if (!disableCaller) {
      const caller = callerLocation()
      if (caller !== undefined) record.caller = caller
    }

    Object.assign(record, encodeFields(fields))

    if (!disableStacktrace && isAtLeast(severity, development ? "warn" : "panic")) {
      record.stacktrace = callerStack()
    }

    this.engine[severity](record, message)
  }
}

/**
 * An info logger pinned to one severity. It never escalates, even at
 * `panic` or `fatal`.
 */
export class PinoInfoLogger implements InfoLogger {
  constructor(
    private readonly core: LogCore,
    readonly severity: Severity,
  ) {}

  enabled(): boolean {
    return true
  }

  info(message: string, ...fields: Field[]): void {
    this.core.log(this.severity, message, fields)
  }

  infof(template: string, ...args: unknown[]): void {
    this.core.logf(this.severity, template, args)
  }

  infow(message: string, ...keysAndValues: unknown[]): void {
    this.core.logw(this.severity, message, keysAndValues)
  }
}

export class PinoLogger implements Logger {
  private constructor(private readonly core: LogCore) {}

  /**
   * @throws {LoggerBuildError} when a sink cannot be opened
   */
  static create(opts: LoggerOptions, deps: LoggerDeps = {}): PinoLogger {
    const state = createEngineState(opts, deps)

    return new PinoLogger(new LogCore(state, state.engine, opts.name))
  }

  /** The pino logger behind this facade, bound fields included. */
  engine(): PinoEngine {
    return this.core.pino
  }

  /** The options the engine was built with, level and format normalised. */
  options(): Readonly<LoggerOptions> {
    return this.core.state.options
  }

  /** Always `true`; only the disabled logger from `v(n)` reports `false`. */
  enabled(): boolean {
    return true
  }

  debug(message: string, ...fields: Field[]): void {
    this.core.log("debug", message, fields)
  }

  debugf(template: string, ...args: unknown[]): void {
    this.core.logf("debug", template, args)
  }

  debugw(message: string, ...keysAndValues: unknown[]): void {
    this.core.logw("debug", message, keysAndValues)
  }

  info(message: string, ...fields: Field[]): void {
    this.core.log("info", message, fields)
  }

  infof(template: string, ...args: unknown[]): void {
    this.core.logf("info", template, args)
  }

  infow(message: string, ...keysAndValues: unknown[]): void {
    this.core.logw("info", message, keysAndValues)
  }

  warn(message: string, ...fields: Field[]): void {
    this.core.log("warn", message, fields)
  }

  warnf(template: string, ...args: unknown[]): void {
    this.core.logf("warn", template, args)
  }

  warnw(message: string, ...keysAndValues: unknown[]): void {
    this.core.logw("warn", message, keysAndValues)
  }

  error(message: string, ...fields: Field[]): void {
    this.core.log("error", message, fields)
  }

  errorf(template: string, ...args: unknown[]): void {
    this.core.logf("error", template, args)
  }

  errorw(message: string, ...keysAndValues: unknown[]): void {
    this.core.logw("error", message, keysAndValues)
  }

  panic(message: string, ...fields: Field[]): never {
    this.core.log("panic", message, fields)

    return this.core.panic(message)
  }

  panicf(template: string, ...args: unknown[]): never {
    const message = format(template, ...args)
    this.core.log("panic", message, [])

    return this.core.panic(message)
  }

  panicw(message: string, ...keysAndValues: unknown[]): never {
    this.core.logw("panic", message, keysAndValues)

    return this.core.panic(message)
  }

  fatal(message: string, ...fields: Field[]): void {
    this.core.log("fatal", message, fields)
    this.core.fatal()
  }

  fatalf(template: string, ...args: unknown[]): void {
    this.core.logf("fatal", template, args)
    this.core.fatal()
  }

  fatalw(message: string, ...keysAndValues: unknown[]): void {
    this.core.logw("fatal", message, keysAndValues)
    this.core.fatal()
  }

  v(level: number): InfoLogger {
    if (level < Verbosity[this.core.state.threshold]) return disabledInfoLogger

    return new PinoInfoLogger(this.core, severityForVerbosity(level))
  }

  write(chunk: string | Uint8Array): number {
    const text = typeof chunk === "string" ? chunk : decoder.decode(chunk)
    const size = typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.byteLength

    try {
      this.core.log("info", text, [])
    } catch (err) {
      this.core.state.reportInternal(err)
    }

    return size
  }

  withValues(...keysAndValues: unknown[]): PinoLogger {
    return new PinoLogger(this.core.derive(this.core.toFields(keysAndValues)))
  }

  withName(name: string): PinoLogger {
    return new PinoLogger(this.core.derive([], joinName(this.core.name, name)))
  }

  fromContext(ctx: LogContextSource | undefined = currentLogContext()): PinoLogger {
    return new PinoLogger(this.core.derive(contextFields(ctx)))
  }

  flush(): Promise<void> {
    return flushSinks(this.core.state)
  }

  /**
   * Flushes, then closes the file sinks shared by this logger and every
   * logger derived from it. Records logged afterwards are lost.
   */
  async close(): Promise<void> {
    await flushSinks(this.core.state)
    this.core.state.close()
  }
}

/**
 * Builds a logger from `opts`.
 *
 * @throws {LoggerBuildError} when a sink cannot be opened
 */
export function createLogger(opts: LoggerOptions, deps: LoggerDeps = {}): PinoLogger {
  return PinoLogger.create(opts, deps)
}
