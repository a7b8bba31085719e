/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in the schema.
 * They are applied in order, later sources overriding earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env", "dotenv:.env.test" */
  readonly name: string

  /**
   * Returns a fresh object on every call. A key mapped to `undefined`
   * means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
