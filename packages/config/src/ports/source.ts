/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Provenance label reported by `explain()`, e.g. "env", "dotenv:.env",
   * "json:logging.json"
   */
  readonly name: string

  /**
   * Load configuration values. A key mapped to `undefined` counts as not
   * provided.
   */
  load(): Promise<Record<string, unknown>>
}
