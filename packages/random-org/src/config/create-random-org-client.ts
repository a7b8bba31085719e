import { createPinoLogger } from "@randwire/logger"
import { RandomOrgClient, type RandomOrgClientDeps } from "../core/random-org-client"
import type { RandomOrgConfig } from "./schema"

/**
 * Builds a client from loaded config. Without an injected logger, logs go
 * through pino at the configured level, bound to `service: "random-org"`.
 */
export function createRandomOrgClient(
  config: RandomOrgConfig,
  deps: RandomOrgClientDeps = {},
): RandomOrgClient {
  const logger =
    deps.logger ??
    createPinoLogger(
      {},
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: "random-org" },
    )

  return new RandomOrgClient(config.client, { ...deps, logger })
}
