/**
 * Validated configuration with provenance.
 *
 * @typeParam T - The output shape of the zod schema the values were parsed with.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ level: z.string().default("info") }),
 *   sources: [new EnvSource({ prefix: "LOG_", keyCase: "kebab" })],
 * })
 *
 * config.get("level")     // "debug"
 * config.explain("level") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Source names that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in the sources but absent from the schema output. */
  unknownKeys(): string[]
}
