import { TransportError } from "../../core/errors"
import type { HttpRequest, HttpResponse, HttpTransport } from "../../ports/transport"

export type FetchTransportDeps = {
  /** Defaults to the global `fetch`. */
  fetch?: typeof fetch
}

/**
 * `HttpTransport` over WHATWG fetch.
 *
 * The request's `timeoutMs` and `signal` both abort the underlying fetch;
 * the resulting error says which one fired.
 */
export class FetchTransport implements HttpTransport {
  private readonly fetch: typeof fetch

  constructor(deps: FetchTransportDeps = {}) {
    this.fetch = deps.fetch ?? globalThis.fetch
  }

  async post(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw TransportError.aborted(request.url, request.signal.reason)
    }

    const controller = new AbortController()
    let timedOut = false

    const onAbort = () => controller.abort(request.signal?.reason)
    request.signal?.addEventListener("abort", onAbort, { once: true })

    const timer =
      request.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true
            controller.abort()
          }, request.timeoutMs)

    try {
      const response = await this.fetch(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      })

      return { status: response.status, body: await response.text() }
    } catch (err) {
      if (timedOut) throw TransportError.timeout(request.url, request.timeoutMs ?? 0, err)
      if (request.signal?.aborted) throw TransportError.aborted(request.url, err)
      throw TransportError.unreachable(request.url, err)
    } finally {
      clearTimeout(timer)
      request.signal?.removeEventListener("abort", onAbort)
    }
  }
}
