import { Writable } from "node:stream"
import type { Logger } from "../../ports/logger"

export type LogWriterSeverity = "debug" | "info" | "warn" | "error"

const decoder = new TextDecoder()

/**
 * A writable stream that logs each chunk as one record, trailing newline
 * removed. Hand it to anything that prints to a stream.
 *
 * @example
 * ```ts
 * const out = new Console({ stdout: new LogWriter(logger), stderr: new LogWriter(logger, "error") })
 * ```
 */
export class LogWriter extends Writable {
  constructor(
    private readonly logger: Logger,
    private readonly severity: LogWriterSeverity = "info",
  ) {
    super({ decodeStrings: false })
  }

  _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = chunk instanceof Uint8Array ? decoder.decode(chunk) : String(chunk)

    this.logger[this.severity](text.replace(/\r?\n$/, ""))
    callback()
  }
}
