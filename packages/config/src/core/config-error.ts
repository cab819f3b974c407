import { BaseError } from "@quill/errors"

export class ConfigError extends BaseError<"config_invalid"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${details}`, {
      code: "config_invalid",
      context: { sources },
    })
  }
}
