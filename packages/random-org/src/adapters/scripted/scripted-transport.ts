import { TransportError } from "../../core/errors"
import type { HttpRequest, HttpResponse, HttpTransport } from "../../ports/transport"

type Reply = HttpResponse | Error | ((request: HttpRequest) => HttpResponse | Promise<HttpResponse>)

/**
 * In-process `HttpTransport` that answers from a queue of prepared replies,
 * one per `post()`. Records every request it receives.
 *
 * @example
 * ```ts
 * const transport = new ScriptedTransport().replyJson({ jsonrpc: "2.0", result: { ... }, id: 1 })
 * const client = new RandomOrgClient({ apiKey: "test-key" }, { transport })
 * ```
 */
export class ScriptedTransport implements HttpTransport {
  private readonly replies: Reply[] = []
  readonly requests: HttpRequest[] = []

  /** Queue a raw reply, an error to throw, or a function computing the reply. */
  reply(reply: Reply): this {
    this.replies.push(reply)
    return this
  }

  replyJson(body: unknown, status = 200): this {
    return this.reply({ status, body: JSON.stringify(body) })
  }

  /** Replies not consumed yet. */
  pending(): number {
    return this.replies.length
  }

  /** Request bodies parsed back from JSON, in send order. */
  sentBodies(): unknown[] {
    return this.requests.map((r): unknown => JSON.parse(r.body))
  }

  async post(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw TransportError.aborted(request.url, request.signal.reason)
    }

    this.requests.push(request)

    const next = this.replies.shift()
    if (next === undefined) {
      throw TransportError.unreachable(request.url, new Error("no scripted reply left"))
    }

    if (next instanceof Error) throw next
    if (typeof next === "function") return next(request)
    return next
  }
}
