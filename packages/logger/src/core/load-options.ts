import { type ConfigSource, EnvSource, loadConfig } from "@quill/config"
import { z } from "zod"
import type { LoggerOptions } from "../ports/logger-options"
import { fromSerialized } from "./options"

const truthy = ["true", "1", "yes"]

const flag = z.preprocess(
  (value) => (typeof value === "string" ? truthy.includes(value.trim().toLowerCase()) : value),
  z.boolean(),
)

const pathList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part !== "")
      : value,
  z.array(z.string()),
)

const loggerOptionsSchema = z.object({
  "output-paths": pathList.optional(),
  "error-output-paths": pathList.optional(),
  level: z.string().optional(),
  format: z.string().optional(),
  "disable-caller": flag.optional(),
  "disable-stacktrace": flag.optional(),
  "enable-color": flag.optional(),
  development: flag.optional(),
  name: z.string().optional(),
})

export type LoadLoggerOptions = {
  /** @default [new EnvSource({ prefix: "LOG_", keyCase: "kebab" })] */
  sources?: ConfigSource[]
}

/**
 * Reads logger options from configuration sources, later sources winning.
 * Comma-separated strings become path lists and "true", "1" or "yes" (any
 * case) turn a flag on.
 *
 * Level and format are not checked here; see `validateOptions`.
 *
 * @throws {ConfigError} when a value has the wrong shape
 */
export async function loadLoggerOptions(opts: LoadLoggerOptions = {}): Promise<LoggerOptions> {
  const config = await loadConfig({
    schema: loggerOptionsSchema,
    sources: opts.sources ?? [new EnvSource({ prefix: "LOG_", keyCase: "kebab" })],
  })

  return fromSerialized(config.value)
}
