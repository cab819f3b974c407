import type { ConfigSource } from "../../ports/source"

export type EnvKeyCase = "preserve" | "kebab"

export type EnvSourceOptions = {
  /** Only variables starting with this prefix are loaded, prefix stripped. */
  prefix?: string

  /**
   * How variable names map to config keys.
   *
   * - `preserve`: `OUTPUT_PATHS` stays `OUTPUT_PATHS`
   * - `kebab`: `OUTPUT_PATHS` becomes `output-paths`
   *
   * @default "preserve"
   */
  keyCase?: EnvKeyCase

  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly keyCase: EnvKeyCase
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.keyCase = options.keyCase ?? "preserve"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const out: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue

      out[this.toConfigKey(key.slice(this.prefix.length))] = value
    }

    return out
  }

  private toConfigKey(name: string): string {
    return this.keyCase === "kebab" ? name.toLowerCase().replaceAll("_", "-") : name
  }
}
