import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@randwire/config"
import { type EnvConfig, envSchema, type RandomOrgConfig } from "./schema"

export type LoadRandomOrgConfigOptions = {
  /** Directory holding the .env files. @default process.cwd() */
  cwd?: string

  /** Applied last, over the .env file and the environment. */
  overrides?: Partial<Record<keyof EnvConfig, string>>
}

export function mapEnvToConfig(env: EnvConfig): RandomOrgConfig {
  return {
    client: {
      apiKey: env.RANDOM_ORG_API_KEY,
      url: env.RANDOM_ORG_URL,
      timeoutMs: env.RANDOM_ORG_TIMEOUT_MS,
      warnBelowRequests: env.RANDOM_ORG_WARN_BELOW_REQUESTS,
      warnBelowBits: env.RANDOM_ORG_WARN_BELOW_BITS,
      honorAdvisoryDelay: env.RANDOM_ORG_HONOR_ADVISORY_DELAY,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
  }
}

/**
 * Reads `.env.<NODE_ENV>` (or `.env`) if present, then `env`, then
 * `overrides`. Later sources win. Throws `ConfigError` when the result does
 * not validate, e.g. without `RANDOM_ORG_API_KEY`.
 */
export async function loadRandomOrgConfig(
  env: Record<string, string | undefined> = process.env,
  options: LoadRandomOrgConfigOptions = {},
): Promise<RandomOrgConfig> {
  const file = env.NODE_ENV ? `.env.${env.NODE_ENV}` : ".env"

  const sources: ConfigSource[] = [
    new DotenvSource({ file, required: false, ...(options.cwd && { cwd: options.cwd }) }),
    new EnvSource({ env }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const config = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(config.value)
}
