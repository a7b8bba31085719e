import type { LogLevelName } from "./log-level"

/**
 * Logging policy. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /** Human-readable output for local runs; keep off where logs are ingested as JSON. */
  prettify?: boolean

  /**
   * Object paths whose values are censored before output.
   * Defaults to `apiKey` at the top level and one level down.
   */
  redactPaths?: string[]
}
