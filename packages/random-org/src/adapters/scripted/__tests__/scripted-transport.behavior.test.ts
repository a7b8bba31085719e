import { TransportError } from "../../../core/errors"
import { ScriptedTransport } from "../scripted-transport"

const URL = "https://random.example.test/json-rpc/4/invoke"

describe("ScriptedTransport behavior", () => {
  it("answers replies in the order they were queued", async () => {
    const transport = new ScriptedTransport()
      .replyJson({ result: 1 })
      .reply({ status: 500, body: "oops" })

    const first = await transport.post({ url: URL, body: "a", headers: {} })
    const second = await transport.post({ url: URL, body: "b", headers: {} })

    expect(first).toEqual({ status: 200, body: '{"result":1}' })
    expect(second).toEqual({ status: 500, body: "oops" })
    expect(transport.pending()).toBe(0)
  })

  it("throws queued errors", async () => {
    const boom = new Error("connection reset")
    const transport = new ScriptedTransport().reply(boom)

    await expect(transport.post({ url: URL, body: "{}", headers: {} })).rejects.toBe(boom)
  })

  it("computes replies from the request", async () => {
    const transport = new ScriptedTransport().reply((request) => ({
      status: 200,
      body: request.body.toUpperCase(),
    }))

    const response = await transport.post({ url: URL, body: "echo", headers: {} })

    expect(response.body).toBe("ECHO")
  })

  it("fails as unreachable once the script runs out", async () => {
    const transport = new ScriptedTransport()

    const err = await transport.post({ url: URL, body: "{}", headers: {} }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(TransportError)
    expect(err).toMatchObject({ code: "transport_unreachable" })
  })

  it("records requests and parses their bodies", async () => {
    const transport = new ScriptedTransport().replyJson({}).replyJson({})

    await transport.post({ url: URL, body: '{"id":1}', headers: {} })
    await transport.post({ url: URL, body: '{"id":2}', headers: {} })

    expect(transport.requests).toHaveLength(2)
    expect(transport.sentBodies()).toEqual([{ id: 1 }, { id: 2 }])
  })
})
