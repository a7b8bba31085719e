import { z } from "zod"
import type { HttpResponse } from "../../ports/transport"
import type { RequestId, RpcMethod } from "../../ports/methods"
import { ProtocolError, RemoteError } from "../errors"

export const JSON_RPC_VERSION = "2.0"

export type WireParams = Record<string, string | number | boolean | readonly unknown[] | undefined>

export type JsonRpcRequest = {
  jsonrpc: typeof JSON_RPC_VERSION
  method: RpcMethod
  params: Record<string, unknown> & { apiKey: string }
  id: RequestId
}

/** Drops undefined params so the service applies its own defaults. */
export function buildRequest(
  method: RpcMethod,
  apiKey: string,
  params: WireParams,
  id: RequestId,
): JsonRpcRequest {
  const wire: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) wire[key] = value
  }

  return {
    jsonrpc: JSON_RPC_VERSION,
    method,
    params: { apiKey, ...wire },
    id,
  }
}

const rpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
})

const envelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: rpcErrorSchema.optional(),
})

export type JsonRpcEnvelope = z.infer<typeof envelopeSchema>

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299
}

function failForStatus(method: RpcMethod, status: number, fallback: ProtocolError): never {
  if (status === 429) throw RemoteError.rateLimited(method, status)
  if (!isSuccessStatus(status)) throw ProtocolError.unexpectedStatus(method, status)
  throw fallback
}

/**
 * Reads a JSON-RPC envelope out of an HTTP response.
 *
 * A JSON-RPC `error` wins over the HTTP status. Without one, 429 becomes a
 * rate-limit `RemoteError` and other non-2xx statuses a `ProtocolError`.
 * Returns the envelope only when it carries a `result`.
 */
export function parseEnvelope(
  method: RpcMethod,
  response: HttpResponse,
): JsonRpcEnvelope & { result: unknown } {
  let json: unknown
  try {
    json = JSON.parse(response.body)
  } catch (err) {
    failForStatus(
      method,
      response.status,
      ProtocolError.malformed(method, "body is not valid JSON", err),
    )
  }

  const parsed = envelopeSchema.safeParse(json)
  if (!parsed.success) {
    failForStatus(
      method,
      response.status,
      ProtocolError.malformed(method, "not a JSON-RPC envelope", parsed.error),
    )
  }

  const envelope = parsed.data

  if (envelope.error) {
    throw RemoteError.fromRpcError(method, envelope.error, response.status)
  }

  if (!isSuccessStatus(response.status)) {
    failForStatus(method, response.status, ProtocolError.unexpectedStatus(method, response.status))
  }

  if (envelope.result === undefined || envelope.result === null) {
    throw ProtocolError.malformed(method, "neither result nor error present")
  }

  return { ...envelope, result: envelope.result }
}
