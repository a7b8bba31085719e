import { ProtocolError, RemoteError } from "../../errors"
import { buildRequest, parseEnvelope } from "../json-rpc"

describe("buildRequest", () => {
  it("puts the api key first and drops undefined params", () => {
    const request = buildRequest(
      "generateIntegers",
      "test-key",
      { n: 5, min: 1, max: 100, replacement: undefined, base: 10 },
      1,
    )

    expect(JSON.stringify(request)).toBe(
      '{"jsonrpc":"2.0","method":"generateIntegers","params":{"apiKey":"test-key","n":5,"min":1,"max":100,"base":10},"id":1}',
    )
  })

  it("keeps string ids", () => {
    expect(buildRequest("getUsage", "test-key", {}, "req-1").id).toBe("req-1")
  })
})

describe("parseEnvelope", () => {
  const ok = (body: unknown, status = 200) => ({ status, body: JSON.stringify(body) })

  it("returns the envelope with its result", () => {
    const envelope = parseEnvelope(
      "generateUUIDs",
      ok({ jsonrpc: "2.0", result: { random: { data: [] } }, id: 4 }),
    )

    expect(envelope.result).toEqual({ random: { data: [] } })
    expect(envelope.id).toBe(4)
  })

  it("throws RemoteError for a JSON-RPC error, even on HTTP 200", () => {
    const err = (() => {
      try {
        parseEnvelope(
          "generateIntegers",
          ok({ jsonrpc: "2.0", error: { code: 401, message: "bad key" }, id: 1 }),
        )
      } catch (e) {
        return e
      }
    })()

    expect(err).toBeInstanceOf(RemoteError)
    expect(err).toMatchObject({
      remoteCode: 401,
      remoteMessage: "bad key",
      kind: "invalid_credential",
      context: { httpStatus: 200 },
    })
  })

  it("prefers the JSON-RPC error over a non-2xx status", () => {
    expect(() =>
      parseEnvelope(
        "generateIntegers",
        ok({ jsonrpc: "2.0", error: { code: 402, message: "quota" }, id: 1 }, 402),
      ),
    ).toThrow(RemoteError)
  })

  it("maps HTTP 429 without an error body to a rate-limit RemoteError", () => {
    expect(() => parseEnvelope("getUsage", { status: 429, body: "slow down" })).toThrow(
      expect.objectContaining({ kind: "rate_limited", remoteCode: 429 }),
    )
  })

  it("maps other non-2xx statuses to unexpected_status", () => {
    expect(() => parseEnvelope("getUsage", { status: 502, body: "<html>" })).toThrow(
      expect.objectContaining({ code: "unexpected_status", context: { method: "getUsage", status: 502 } }),
    )
    expect(() => parseEnvelope("getUsage", ok({ jsonrpc: "2.0", result: {}, id: 1 }, 500))).toThrow(
      expect.objectContaining({ code: "unexpected_status" }),
    )
  })

  it("rejects bodies that are not JSON", () => {
    expect(() => parseEnvelope("generateStrings", { status: 200, body: "not json" })).toThrow(
      "Malformed generateStrings response: body is not valid JSON",
    )
  })

  it("rejects JSON that is not an envelope", () => {
    expect(() => parseEnvelope("generateStrings", { status: 200, body: "[1,2,3]" })).toThrow(
      ProtocolError,
    )
    expect(() =>
      parseEnvelope("generateStrings", ok({ error: { code: "x", message: 1 } })),
    ).toThrow("Malformed generateStrings response: not a JSON-RPC envelope")
  })

  it("rejects envelopes with neither result nor error", () => {
    expect(() => parseEnvelope("generateGaussians", ok({ jsonrpc: "2.0", id: 1 }))).toThrow(
      "Malformed generateGaussians response: neither result nor error present",
    )
    expect(() =>
      parseEnvelope("generateGaussians", ok({ jsonrpc: "2.0", result: null, id: 1 })),
    ).toThrow("neither result nor error present")
  })
})
