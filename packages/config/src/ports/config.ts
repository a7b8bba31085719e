/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     RANDOM_ORG_API_KEY: z.string().min(1),
 *     RANDOM_ORG_TIMEOUT_MS: z.coerce.number().default(10_000),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("RANDOM_ORG_TIMEOUT_MS")     // 10000
 * config.explain("RANDOM_ORG_API_KEY")    // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that supplied the final value for `key`
   * (e.g. "env", "dotenv:.env.production"), or "default" for schema defaults.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, deduplicated. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema. */
  extras(): string[]
}
