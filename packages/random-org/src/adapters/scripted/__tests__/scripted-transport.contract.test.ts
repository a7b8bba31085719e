import { describeHttpTransportContract } from "../../../ports/__tests__/transport.contract"
import { ScriptedTransport } from "../scripted-transport"

let current: ScriptedTransport | undefined

describeHttpTransportContract({
  name: "ScriptedTransport",
  make: (reply) => {
    current = new ScriptedTransport().reply(reply)
    return current
  },
  lastSentBody: () => current?.requests.at(-1)?.body,
})
