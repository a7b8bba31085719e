import { describeHttpTransportContract } from "../../../ports/__tests__/transport.contract"
import { FetchTransport } from "../fetch-transport"

let lastBody: string | undefined

describeHttpTransportContract({
  name: "FetchTransport",
  make: (reply) => {
    lastBody = undefined

    return new FetchTransport({
      fetch: async (_input, init) => {
        lastBody = typeof init?.body === "string" ? init.body : undefined
        return new Response(reply.body, { status: reply.status })
      },
    })
  },
  lastSentBody: () => lastBody,
})
