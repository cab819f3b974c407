import { BaseError } from "@quill/errors"

export type LogOptionsErrorCode = "log_invalid_level" | "log_invalid_format"

export class LogOptionsError extends BaseError<LogOptionsErrorCode> {
  constructor(code: LogOptionsErrorCode, message: string, value: unknown) {
    super(message, { code, context: { value } })
  }
}

/** A sink could not be opened while building a logger. */
export class LoggerBuildError extends BaseError<"log_sink_open_failed"> {
  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`cannot open log sink "${path}": ${reason}`, {
      code: "log_sink_open_failed",
      context: { path },
      cause,
    })
  }
}

/** Thrown by `panic*` after the record has been written. */
export class PanicError extends BaseError<"log_panic"> {
  constructor(message: string) {
    super(message, { code: "log_panic", isOperational: false })
  }
}
