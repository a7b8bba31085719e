import type { Milliseconds } from "@randwire/clock"
import { BaseError, type BaseErrorOptions } from "@randwire/errors"
import type { RpcMethod } from "../ports/methods"

export type TransportErrorCode =
  | "transport_unreachable"
  | "transport_timeout"
  | "transport_aborted"

/** No response arrived. */
export class TransportError extends BaseError<TransportErrorCode> {
  static unreachable(url: string, cause: unknown): TransportError {
    return new TransportError(`Could not reach ${url}`, {
      code: "transport_unreachable",
      context: { url },
      cause,
      isRetryable: true,
    })
  }

  static timeout(url: string, timeoutMs: Milliseconds, cause?: unknown): TransportError {
    return new TransportError(`No response from ${url} within ${timeoutMs}ms`, {
      code: "transport_timeout",
      context: { url, timeoutMs },
      cause,
      isRetryable: true,
    })
  }

  static aborted(url: string, cause?: unknown): TransportError {
    return new TransportError(`Request to ${url} was aborted by the caller`, {
      code: "transport_aborted",
      context: { url },
      cause,
    })
  }
}

export type ProtocolErrorCode =
  | "malformed_response"
  | "unexpected_status"
  | "integrity_violation"

/** A response arrived but cannot be trusted or understood. */
export class ProtocolError extends BaseError<ProtocolErrorCode> {
  static malformed(method: RpcMethod, reason: string, cause?: unknown): ProtocolError {
    return new ProtocolError(`Malformed ${method} response: ${reason}`, {
      code: "malformed_response",
      context: { method },
      cause,
    })
  }

  static unexpectedStatus(method: RpcMethod, status: number): ProtocolError {
    return new ProtocolError(`Unexpected HTTP status ${status} for ${method}`, {
      code: "unexpected_status",
      context: { method, status },
      isRetryable: status >= 500,
    })
  }

  static integrity(method: RpcMethod, problems: readonly string[]): ProtocolError {
    return new ProtocolError(`${method} result failed checks: ${problems.join("; ")}`, {
      code: "integrity_violation",
      context: { method, problems },
    })
  }
}

export type RemoteErrorKind =
  | "invalid_credential"
  | "quota_exceeded"
  | "invalid_params"
  | "rate_limited"
  | "service_error"
  | "unknown"

/**
 * Buckets RANDOM.ORG and JSON-RPC error codes.
 * @see {@link https://api.random.org/json-rpc/4/error-codes | Error Codes}
 */
export function classifyRemoteCode(code: number): RemoteErrorKind {
  if (code === 400 || code === 401) return "invalid_credential"
  if (code === 402 || code === 403) return "quota_exceeded"
  if (code === 429) return "rate_limited"
  if (code >= 200 && code < 400) return "invalid_params"
  if (code >= -32602 && code <= -32600) return "invalid_params"
  if (code === 100 || code === 32000 || code === -32603 || code === -32700) return "service_error"
  return "unknown"
}

export type RemoteErrorDetails = {
  method: RpcMethod
  remoteCode: number
  remoteMessage: string
  kind: RemoteErrorKind
  httpStatus?: number
  data?: unknown
}

/** The service answered with an error. Code and message are kept as sent. */
export class RemoteError extends BaseError<"remote_error"> {
  readonly remoteCode: number
  readonly remoteMessage: string
  readonly kind: RemoteErrorKind

  constructor(details: RemoteErrorDetails, options?: Pick<BaseErrorOptions, "cause">) {
    super(`RANDOM.ORG ${details.method} failed with ${details.remoteCode}: ${details.remoteMessage}`, {
      code: "remote_error",
      context: {
        method: details.method,
        remoteCode: details.remoteCode,
        kind: details.kind,
        ...(details.httpStatus !== undefined && { httpStatus: details.httpStatus }),
        ...(details.data !== undefined && { data: details.data }),
      },
      cause: options?.cause,
      isRetryable: details.kind === "rate_limited" || details.kind === "service_error",
    })

    this.remoteCode = details.remoteCode
    this.remoteMessage = details.remoteMessage
    this.kind = details.kind
  }

  static fromRpcError(
    method: RpcMethod,
    error: { code: number; message: string; data?: unknown },
    httpStatus?: number,
  ): RemoteError {
    return new RemoteError({
      method,
      remoteCode: error.code,
      remoteMessage: error.message,
      kind: classifyRemoteCode(error.code),
      ...(httpStatus !== undefined && { httpStatus }),
      ...(error.data !== undefined && { data: error.data }),
    })
  }

  static rateLimited(method: RpcMethod, httpStatus: number): RemoteError {
    return new RemoteError({
      method,
      remoteCode: httpStatus,
      remoteMessage: "Too Many Requests",
      kind: "rate_limited",
      httpStatus,
    })
  }
}

/** Parameters broke a documented limit; nothing was sent. */
export class ValidationError extends BaseError<"invalid_params"> {
  readonly issues: readonly string[]

  constructor(target: string, issues: readonly string[]) {
    super(`Invalid ${target} parameters: ${issues.join("; ")}`, {
      code: "invalid_params",
      context: { target, issues },
    })

    this.issues = issues
  }
}
