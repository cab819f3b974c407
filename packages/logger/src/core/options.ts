import { z } from "zod"
import type { LogFormat, LoggerOptions } from "../ports/logger-options"
import { LogOptionsError, type LogOptionsErrorCode } from "./errors"
import { parseSeverity } from "./levels"

const formats: readonly LogFormat[] = ["console", "json"]

export function newOptions(): LoggerOptions {
  return {
    outputPaths: ["stdout"],
    errorOutputPaths: ["stderr"],
    level: "info",
    format: "console",
    disableCaller: false,
    disableStacktrace: false,
    enableColor: false,
    development: false,
    name: "",
  }
}

export function parseFormat(text: string): LogFormat | undefined {
  const lowered = text.toLowerCase()

  return formats.find((f) => f === lowered)
}

// Key order fixes the order errors are reported in.
const validationSchema = z.object({
  level: z.string().superRefine((level, ctx) => {
    if (parseSeverity(level) === undefined) {
      ctx.addIssue({ code: "custom", message: `unrecognized level: "${level}"` })
    }
  }),
  format: z.string().superRefine((format, ctx) => {
    if (parseFormat(format) === undefined) {
      ctx.addIssue({ code: "custom", message: `not a valid log format: "${format}"` })
    }
  }),
})

const issueCodes: Record<string, LogOptionsErrorCode> = {
  level: "log_invalid_level",
  format: "log_invalid_format",
}

/**
 * Checks the level and the format. Both checks always run; the returned list
 * is empty for valid options.
 */
export function validateOptions(opts: Pick<LoggerOptions, "level" | "format">): LogOptionsError[] {
  const result = validationSchema.safeParse({ level: opts.level, format: opts.format })

  if (result.success) return []

  return result.error.issues.map((issue) => {
    const key = String(issue.path[0])

    return new LogOptionsError(
      issueCodes[key] ?? "log_invalid_level",
      issue.message,
      key === "format" ? opts.format : opts.level,
    )
  })
}

const serializedSchema = z.object({
  "output-paths": z.array(z.string()).optional(),
  "error-output-paths": z.array(z.string()).optional(),
  level: z.string().optional(),
  format: z.string().optional(),
  "disable-caller": z.boolean().optional(),
  "disable-stacktrace": z.boolean().optional(),
  "enable-color": z.boolean().optional(),
  development: z.boolean().optional(),
  name: z.string().optional(),
})

export type SerializedLoggerOptions = z.infer<typeof serializedSchema>

export function toSerialized(opts: LoggerOptions): Required<SerializedLoggerOptions> {
  return {
    "output-paths": [...opts.outputPaths],
    "error-output-paths": [...opts.errorOutputPaths],
    level: opts.level,
    format: opts.format,
    "disable-caller": opts.disableCaller,
    "disable-stacktrace": opts.disableStacktrace,
    "enable-color": opts.enableColor,
    development: opts.development,
    name: opts.name,
  }
}

export function fromSerialized(data: SerializedLoggerOptions): LoggerOptions {
  const defaults = newOptions()

  return {
    outputPaths: data["output-paths"] ?? defaults.outputPaths,
    errorOutputPaths: data["error-output-paths"] ?? defaults.errorOutputPaths,
    level: data.level ?? defaults.level,
    format: data.format ?? defaults.format,
    disableCaller: data["disable-caller"] ?? defaults.disableCaller,
    disableStacktrace: data["disable-stacktrace"] ?? defaults.disableStacktrace,
    enableColor: data["enable-color"] ?? defaults.enableColor,
    development: data.development ?? defaults.development,
    name: data.name ?? defaults.name,
  }
}

/**
 * JSON with the configuration-file key names, e.g. for logging the active
 * options at startup.
 */
export function optionsToString(opts: LoggerOptions): string {
  return JSON.stringify(toSerialized(opts))
}

/**
 * Reads options written by {@link optionsToString} (or a configuration object
 * with the same keys); absent keys take the defaults.
 */
export function parseOptions(input: string | Readonly<Record<string, unknown>>): LoggerOptions {
  const data: unknown = typeof input === "string" ? JSON.parse(input) : input

  return fromSerialized(serializedSchema.parse(data))
}
