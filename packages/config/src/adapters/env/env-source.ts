import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Keep only keys starting with this prefix, and strip it. */
  prefix?: string
  /** @default process.env */
  env?: Record<string, string | undefined>
}

/** Process environment (or an injected map) as a config source. */
export class EnvSource implements ConfigSource {
  readonly name = "env"

  constructor(private readonly options: EnvSourceOptions = {}) {}

  async load(): Promise<Record<string, unknown>> {
    const { prefix } = this.options
    const entries = Object.entries(this.options.env ?? process.env)

    if (!prefix) return Object.fromEntries(entries)

    return Object.fromEntries(
      entries
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]) => [key.slice(prefix.length), value]),
    )
  }
}
