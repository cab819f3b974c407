import { format as formatMessage } from "node:util"
import { PanicError } from "../../core/errors"
import type { Field } from "../../ports/field"
import type { InfoLogger, Logger } from "../../ports/logger"

export class NoopInfoLogger implements InfoLogger {
  enabled(): boolean {
    return false
  }

  info(_message: string, ..._fields: Field[]): void {}

  infof(_format: string, ..._args: unknown[]): void {}

  infow(_message: string, ..._keysAndValues: unknown[]): void {}
}

/** Returned by `v(n)` whenever verbosity `n` is below the threshold. */
export const disabledInfoLogger: InfoLogger = new NoopInfoLogger()

/**
 * Discards every record. Panic and fatal still escalate.
 */
export class NullLogger extends NoopInfoLogger implements Logger {
  constructor(private readonly exit: (code: number) => void = (code) => process.exit(code)) {
    super()
  }

  debug(_message: string, ..._fields: Field[]): void {}
  debugf(_format: string, ..._args: unknown[]): void {}
  debugw(_message: string, ..._keysAndValues: unknown[]): void {}

  warn(_message: string, ..._fields: Field[]): void {}
  warnf(_format: string, ..._args: unknown[]): void {}
  warnw(_message: string, ..._keysAndValues: unknown[]): void {}

  error(_message: string, ..._fields: Field[]): void {}
  errorf(_format: string, ..._args: unknown[]): void {}
  errorw(_message: string, ..._keysAndValues: unknown[]): void {}

  panic(message: string, ..._fields: Field[]): never {
    throw new PanicError(message)
  }

  panicf(format: string, ...args: unknown[]): never {
    throw new PanicError(formatMessage(format, ...args))
  }

  panicw(message: string, ..._keysAndValues: unknown[]): never {
    throw new PanicError(message)
  }

  fatal(_message: string, ..._fields: Field[]): void {
    this.exit(1)
  }

  fatalf(_format: string, ..._args: unknown[]): void {
    this.exit(1)
  }

  fatalw(_message: string, ..._keysAndValues: unknown[]): void {
    this.exit(1)
  }

  v(_level: number): InfoLogger {
    return disabledInfoLogger
  }

  write(chunk: string | Uint8Array): number {
    return typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.byteLength
  }

  withValues(..._keysAndValues: unknown[]): Logger {
    return this
  }

  withName(_name: string): Logger {
    return this
  }

  fromContext(): Logger {
    return this
  }

  async flush(): Promise<void> {}
}

export function createNullLogger(exit?: (code: number) => void): Logger {
  return new NullLogger(exit)
}
