import type { Field } from "./field"
import type { LogContextSource } from "./log-context"

/**
 * The minimal logging capability, gated at one severity.
 */
export interface InfoLogger {
  /** `false` only for the disabled logger returned by `v(n)` below the threshold. */
  enabled(): boolean

  info(message: string, ...fields: Field[]): void

  /** printf-style message, formatted only when the record is emitted. */
  infof(format: string, ...args: unknown[]): void

  /** Alternating keys and values: `infow("saved", "id", 7, "ms", 12)`. */
  infow(message: string, ...keysAndValues: unknown[]): void
}

export interface Logger extends InfoLogger {
  debug(message: string, ...fields: Field[]): void
  debugf(format: string, ...args: unknown[]): void
  debugw(message: string, ...keysAndValues: unknown[]): void

  warn(message: string, ...fields: Field[]): void
  warnf(format: string, ...args: unknown[]): void
  warnw(message: string, ...keysAndValues: unknown[]): void

  error(message: string, ...fields: Field[]): void
  errorf(format: string, ...args: unknown[]): void
  errorw(message: string, ...keysAndValues: unknown[]): void

  /** Writes the record, flushes, then throws a `PanicError`. */
  panic(message: string, ...fields: Field[]): never
  panicf(format: string, ...args: unknown[]): never
  panicw(message: string, ...keysAndValues: unknown[]): never

  /** Writes the record, flushes, then exits the process with status 1. */
  fatal(message: string, ...fields: Field[]): void
  fatalf(format: string, ...args: unknown[]): void
  fatalw(message: string, ...keysAndValues: unknown[]): void

  /**
   * An info logger at verbosity `level` (`info` is 0, `debug` is -1), or the
   * shared disabled logger when that verbosity is below the threshold.
   */
  v(level: number): InfoLogger

  /**
   * Emits `chunk` as one info record and returns its length in bytes.
   * Lets the logger stand in wherever raw text output is expected.
   */
  write(chunk: string | Uint8Array): number

  /** A new logger with these pairs bound to every record. */
  withValues(...keysAndValues: unknown[]): Logger

  /** A new logger named `<parent>.<name>`. */
  withName(name: string): Logger

  /**
   * A new logger with the well-known context values bound. Without an
   * argument the current async context is used.
   */
  fromContext(ctx?: LogContextSource): Logger

  /** Resolves once every sink has written out its buffered records. */
  flush(): Promise<void>
}
