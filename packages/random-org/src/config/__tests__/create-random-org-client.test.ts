import type { Logger } from "@randwire/logger"
import { mock } from "vitest-mock-extended"
import { ScriptedTransport } from "../../adapters/scripted/scripted-transport"
import { RandomOrgClient } from "../../core/random-org-client"
import { createRandomOrgClient } from "../create-random-org-client"
import type { RandomOrgConfig } from "../schema"

const config: RandomOrgConfig = {
  client: {
    apiKey: "test-key",
    url: "http://localhost:8080/invoke",
    timeoutMs: 500,
    warnBelowRequests: 10,
    warnBelowBits: 0,
    honorAdvisoryDelay: false,
  },
  logging: { level: "fatal", prettify: false },
}

describe("createRandomOrgClient", () => {
  it("builds a client with the configured endpoint and timeout", async () => {
    const transport = new ScriptedTransport().replyJson({
      jsonrpc: "2.0",
      result: { bitsLeft: 100, requestsLeft: 5 },
      id: 1,
    })
    const logger = mock<Logger>()

    const client = createRandomOrgClient(config, { transport, logger })
    await client.getUsage()

    expect(client).toBeInstanceOf(RandomOrgClient)
    expect(transport.requests[0]).toMatchObject({
      url: "http://localhost:8080/invoke",
      timeoutMs: 500,
    })
    expect(logger.warn).toHaveBeenCalledWith(
      "low request quota",
      expect.objectContaining({ requestsLeft: 5, threshold: 10 }),
    )
  })

  it("falls back to a pino logger", () => {
    expect(createRandomOrgClient(config, { transport: new ScriptedTransport() })).toBeInstanceOf(
      RandomOrgClient,
    )
  })
})
