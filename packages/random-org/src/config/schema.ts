import type { Milliseconds } from "@randwire/clock"
import { type LogLevelName, logLevelNames } from "@randwire/logger"
import { z } from "zod"
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT_MS } from "../core/random-org-client"

export const envSchema = z.object({
  RANDOM_ORG_API_KEY: z
    .string({ error: "RANDOM_ORG_API_KEY is required" })
    .min(1, "RANDOM_ORG_API_KEY is required"),
  RANDOM_ORG_URL: z.url().default(DEFAULT_ENDPOINT),
  RANDOM_ORG_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  RANDOM_ORG_WARN_BELOW_REQUESTS: z.coerce.number().int().nonnegative().default(0),
  RANDOM_ORG_WARN_BELOW_BITS: z.coerce.number().int().nonnegative().default(0),
  RANDOM_ORG_HONOR_ADVISORY_DELAY: z.stringbool().default(false),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type EnvConfig = z.infer<typeof envSchema>

export type RandomOrgConfig = {
  client: {
    apiKey: string
    url: string
    timeoutMs: Milliseconds
    warnBelowRequests: number
    warnBelowBits: number
    honorAdvisoryDelay: boolean
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }
}
