import type { Milliseconds } from "@randwire/clock"

export type HttpRequest = {
  url: string
  body: string
  headers: Record<string, string>

  /** Abort the call after this long. No limit when omitted. */
  timeoutMs?: Milliseconds

  signal?: AbortSignal
}

export type HttpResponse = {
  status: number
  body: string
}

/**
 * Sends one POST and hands back the raw status and body.
 *
 * Implementations reject with a `TransportError` when no response arrives
 * (unreachable host, timeout, caller abort). Any status code counts as a
 * response; interpreting it is the client's job.
 */
export interface HttpTransport {
  post(request: HttpRequest): Promise<HttpResponse>
}
