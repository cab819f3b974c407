/**
 * A destination for serialized records, one newline-terminated line per write.
 *
 * pino destinations (sonic-boom) satisfy this interface.
 */
export interface LogSink {
  write(line: string): unknown

  /** Writes out buffered data, then calls back. */
  flush?(cb: (err?: Error | null) => void): void

  /** Writes out buffered data before returning. */
  flushSync?(): void

  on?(event: "error", listener: (err: Error) => void): unknown

  /** Writes out buffered data and releases the destination. */
  end?(): void
}
