export type LogFormat = "console" | "json"

/**
 * Configuration of a logger and its sinks.
 *
 * `level` and `format` are plain strings so that unvalidated input can be
 * carried and reported; see `validateOptions`.
 */
export type LoggerOptions = {
  /** Sinks for records: "stdout", "stderr" or file paths. */
  outputPaths: string[]

  /** Sinks for the logger's own failures (a sink that stops accepting writes). */
  errorOutputPaths: string[]

  /**
   * Minimum severity to emit, case-insensitive. An unrecognised value builds
   * as "info".
   */
  level: string

  /** "console" (human-readable) or "json", case-insensitive. */
  format: string

  /** Omit the `caller` field. */
  disableCaller: boolean

  /** Omit the `stacktrace` field on panic and fatal records. */
  disableStacktrace: boolean

  /** Colour level labels in console format. */
  enableColor: boolean

  /**
   * Development mode: stack traces are attached from `warn` upwards instead
   * of from `panic`.
   */
  development: boolean

  /** Root logger name, the first segment of every `withName` hierarchy. */
  name: string
}
