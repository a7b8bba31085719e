import { type Clock, type Milliseconds, SystemClock } from "@randwire/clock"
import { isAppError, serializeError } from "@randwire/errors"
import { type IdGenerator, sequence } from "@randwire/id"
import { type Logger, NullLogger } from "@randwire/logger"
import type { z } from "zod"
import { FetchTransport } from "../adapters/fetch/fetch-transport"
import type {
  BlobParams,
  CallOptions,
  DecimalFractionParams,
  DecimalIntegerParams,
  DecimalIntegerSequenceParams,
  EncodedIntegerParams,
  GaussianParams,
  IntegerParams,
  IntegerSequenceParams,
  RequestId,
  RpcMethod,
  StringParams,
  UuidParams,
} from "../ports/methods"
import type {
  GenerationResult,
  QuotaSnapshot,
  UsageCounters,
  UsageSnapshot,
} from "../ports/results"
import type { HttpResponse, HttpTransport } from "../ports/transport"
import { ProtocolError, TransportError, ValidationError } from "./errors"
import {
  checkCountResult,
  checkFractionsResult,
  checkIntegerSequencesResult,
  checkIntegersResult,
  checkStringsResult,
} from "./protocol/check-integrity"
import { decodeBlob } from "./protocol/decode-blob"
import { buildRequest, parseEnvelope, type WireParams } from "./protocol/json-rpc"
import {
  decimalIntegersResult,
  encodedIntegersResult,
  integerSequencesResult,
  numbersResult,
  stringsResult,
  usageResult,
  uuidsResult,
  type WireCounters,
} from "./protocol/result-schemas"
import {
  validateBlobs,
  validateDecimalFractions,
  validateGaussians,
  validateIntegerSequences,
  validateIntegers,
  validateStrings,
  validateUuids,
} from "./validation/validate-params"

export const DEFAULT_ENDPOINT = "https://api.random.org/json-rpc/4/invoke"
export const DEFAULT_TIMEOUT_MS: Milliseconds = 10_000

export type RandomOrgClientOptions = {
  apiKey: string

  /** @default DEFAULT_ENDPOINT */
  url?: string

  /** Per-call limit, surfaced as `TransportError` `transport_timeout`. @default 10000 */
  timeoutMs?: Milliseconds

  /** Warn when `requestsLeft` drops below this. 0 disables. @default 0 */
  warnBelowRequests?: number

  /** Warn when `bitsLeft` drops below this. 0 disables. @default 0 */
  warnBelowBits?: number

  /**
   * Wait out the `advisoryDelay` of the previous response before sending
   * the next request. @default false
   */
  honorAdvisoryDelay?: boolean
}

export type RandomOrgClientDeps = {
  transport?: HttpTransport
  logger?: Logger
  clock?: Clock
  ids?: IdGenerator<RequestId>
}

type Generation<T> = {
  random: { data: T; completionTime?: Date | undefined }
} & WireCounters

/**
 * Client for the RANDOM.ORG JSON-RPC Basic API.
 *
 * Every method validates its parameters locally, sends exactly one request
 * and either returns checked data or throws one of `ValidationError`,
 * `TransportError`, `ProtocolError` or `RemoteError`. Nothing is retried.
 *
 * @example
 * ```ts
 * const client = new RandomOrgClient({ apiKey: process.env.RANDOM_ORG_API_KEY ?? "" })
 * const { data } = await client.generateIntegers({ n: 6, min: 1, max: 49, replacement: false })
 * ```
 */
export class RandomOrgClient {
  private readonly apiKey: string
  private readonly url: string
  private readonly timeoutMs: Milliseconds
  private readonly warnBelowRequests: number
  private readonly warnBelowBits: number
  private readonly honorAdvisoryDelay: boolean

  private readonly transport: HttpTransport
  private readonly logger: Logger
  private readonly clock: Clock
  private readonly ids: IdGenerator<RequestId>

  private quota: QuotaSnapshot | undefined
  private nextDispatchAtMs: Milliseconds = 0

  constructor(options: RandomOrgClientOptions, deps: RandomOrgClientDeps = {}) {
    const issues: string[] = []
    if (!options.apiKey) issues.push("apiKey must be a non-empty string")
    if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
      issues.push(`timeoutMs must be positive, got ${options.timeoutMs}`)
    }
    if (issues.length > 0) throw new ValidationError("client", issues)

    this.apiKey = options.apiKey
    this.url = options.url ?? DEFAULT_ENDPOINT
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.warnBelowRequests = options.warnBelowRequests ?? 0
    this.warnBelowBits = options.warnBelowBits ?? 0
    this.honorAdvisoryDelay = options.honorAdvisoryDelay ?? false

    this.transport = deps.transport ?? new FetchTransport()
    this.logger = deps.logger ?? new NullLogger()
    this.clock = deps.clock ?? new SystemClock()
    this.ids = deps.ids ?? sequence()
  }

  /** True random integers in `[min, max]`. */
  generateIntegers(
    params: DecimalIntegerParams,
    call?: CallOptions,
  ): Promise<GenerationResult<number[]>>
  generateIntegers(
    params: EncodedIntegerParams,
    call?: CallOptions,
  ): Promise<GenerationResult<string[]>>
  generateIntegers(
    params: IntegerParams,
    call?: CallOptions,
  ): Promise<GenerationResult<number[] | string[]>>
  async generateIntegers(
    params: IntegerParams,
    call?: CallOptions,
  ): Promise<GenerationResult<number[] | string[]>> {
    validateIntegers(params)

    const wire: WireParams = {
      n: params.n,
      min: params.min,
      max: params.max,
      replacement: params.replacement,
      base: params.base,
    }

    if (params.base === undefined || params.base === 10) {
      return this.invoke("generateIntegers", wire, call, decimalIntegersResult, (result) =>
        this.toGeneration("generateIntegers", result, checkIntegersResult(params, result.random.data)),
      )
    }

    return this.invoke("generateIntegers", wire, call, encodedIntegersResult, (result) =>
      this.toGeneration("generateIntegers", result, checkIntegersResult(params, result.random.data)),
    )
  }

  /** `n` sequences of random integers; see `IntegerSequenceParams` for per-sequence fields. */
  generateIntegerSequences(
    params: DecimalIntegerSequenceParams,
    call?: CallOptions,
  ): Promise<GenerationResult<number[][]>>
  generateIntegerSequences(
    params: IntegerSequenceParams,
    call?: CallOptions,
  ): Promise<GenerationResult<(number | string)[][]>>
  async generateIntegerSequences(
    params: IntegerSequenceParams,
    call?: CallOptions,
  ): Promise<GenerationResult<(number | string)[][]>> {
    validateIntegerSequences(params)

    const wire: WireParams = {
      n: params.n,
      length: params.length,
      min: params.min,
      max: params.max,
      replacement: params.replacement,
      base: params.base,
    }

    return this.invoke("generateIntegerSequences", wire, call, integerSequencesResult, (result) =>
      this.toGeneration(
        "generateIntegerSequences",
        result,
        checkIntegerSequencesResult(params, result.random.data),
      ),
    )
  }

  /** Uniform fractions in `[0, 1)` with `decimalPlaces` digits. */
  async generateDecimalFractions(
    params: DecimalFractionParams,
    call?: CallOptions,
  ): Promise<GenerationResult<number[]>> {
    validateDecimalFractions(params)

    const wire: WireParams = {
      n: params.n,
      decimalPlaces: params.decimalPlaces,
      replacement: params.replacement,
    }

    return this.invoke("generateDecimalFractions", wire, call, numbersResult, (result) =>
      this.toGeneration(
        "generateDecimalFractions",
        result,
        checkFractionsResult(params, result.random.data),
      ),
    )
  }

  async generateGaussians(
    params: GaussianParams,
    call?: CallOptions,
  ): Promise<GenerationResult<number[]>> {
    validateGaussians(params)

    const wire: WireParams = {
      n: params.n,
      mean: params.mean,
      standardDeviation: params.standardDeviation,
      significantDigits: params.significantDigits,
    }

    return this.invoke("generateGaussians", wire, call, numbersResult, (result) =>
      this.toGeneration(
        "generateGaussians",
        result,
        checkCountResult("numbers", params.n, result.random.data),
      ),
    )
  }

  async generateStrings(
    params: StringParams,
    call?: CallOptions,
  ): Promise<GenerationResult<string[]>> {
    validateStrings(params)

    const wire: WireParams = {
      n: params.n,
      length: params.length,
      characters: params.characters,
      replacement: params.replacement,
    }

    return this.invoke("generateStrings", wire, call, stringsResult, (result) =>
      this.toGeneration("generateStrings", result, checkStringsResult(params, result.random.data)),
    )
  }

  /** Version 4 UUIDs. */
  async generateUUIDs(params: UuidParams, call?: CallOptions): Promise<GenerationResult<string[]>> {
    validateUuids(params)

    return this.invoke("generateUUIDs", { n: params.n }, call, uuidsResult, (result) =>
      this.toGeneration(
        "generateUUIDs",
        result,
        checkCountResult("UUIDs", params.n, result.random.data),
      ),
    )
  }

  /** Random bytes, decoded from the wire format. `size` is in bits. */
  async generateBlobs(
    params: BlobParams,
    call?: CallOptions,
  ): Promise<GenerationResult<Uint8Array[]>> {
    validateBlobs(params)

    const format = params.format ?? "base64"
    const wire: WireParams = { n: params.n, size: params.size, format: params.format }

    return this.invoke("generateBlobs", wire, call, stringsResult, (result) => {
      const problems = checkCountResult("blobs", params.n, result.random.data)
      const blobs: Uint8Array[] = []

      result.random.data.forEach((encoded, i) => {
        const bytes = decodeBlob(encoded, format)
        if (!bytes) {
          problems.push(`blob ${i} is not valid ${format}`)
        } else if (bytes.length * 8 !== params.size) {
          problems.push(`blob ${i} holds ${bytes.length * 8} bits, expected ${params.size}`)
        } else {
          blobs.push(bytes)
        }
      })

      return this.toGeneration(
        "generateBlobs",
        { ...result, random: { ...result.random, data: blobs } },
        problems,
      )
    })
  }

  /** Current allowance of the API key. Also refreshes `lastKnownQuota()`. */
  async getUsage(call?: CallOptions): Promise<UsageSnapshot> {
    return this.invoke("getUsage", {}, call, usageResult, (result) => ({
      ...(result.status !== undefined && { status: result.status }),
      ...(result.creationTime !== undefined && { creationTime: result.creationTime }),
      bitsLeft: result.bitsLeft,
      requestsLeft: result.requestsLeft,
      ...(result.totalBits !== undefined && { totalBits: result.totalBits }),
      ...(result.totalRequests !== undefined && { totalRequests: result.totalRequests }),
    }))
  }

  /** Counters from the most recent response that carried any, if there was one. */
  lastKnownQuota(): QuotaSnapshot | undefined {
    return this.quota ? { ...this.quota } : undefined
  }

  private toGeneration<T>(
    method: RpcMethod,
    result: Generation<T>,
    problems: readonly string[],
  ): GenerationResult<T> {
    if (problems.length > 0) throw ProtocolError.integrity(method, problems)

    const usage: UsageCounters = {
      ...(result.bitsUsed !== undefined && { bitsUsed: result.bitsUsed }),
      ...(result.bitsLeft !== undefined && { bitsLeft: result.bitsLeft }),
      ...(result.requestsLeft !== undefined && { requestsLeft: result.requestsLeft }),
      ...(result.advisoryDelay !== undefined && { advisoryDelayMs: result.advisoryDelay }),
    }

    return {
      data: result.random.data,
      ...(result.random.completionTime !== undefined && {
        completionTime: result.random.completionTime,
      }),
      usage,
    }
  }

  /**
   * Shared request cycle: build, send, parse, check, record quota.
   * `shape` turns the schema-checked result into the caller's value and may
   * throw `ProtocolError` when the data does not match the request.
   */
  private async invoke<T extends WireCounters, R>(
    method: RpcMethod,
    params: WireParams,
    call: CallOptions | undefined,
    schema: z.ZodType<T>,
    shape: (result: T) => R,
  ): Promise<R> {
    const id = call?.id ?? this.ids.generate()
    const meta = { module: "random-org", rpcMethod: method, rpcId: id }
    const request = buildRequest(method, this.apiKey, params, id)

    await this.waitForAdvisoryDelay(call?.signal)

    this.logger.debug("sending request", { ...meta, params })
    const startedAt = this.clock.nowMs()

    try {
      const response = await this.send(JSON.stringify(request), call?.signal)
      const envelope = parseEnvelope(method, response)

      if (envelope.id !== undefined && envelope.id !== null && envelope.id !== id) {
        this.logger.warn("response id does not match request id", {
          ...meta,
          responseId: envelope.id,
        })
      }

      const parsed = schema.safeParse(envelope.result)
      if (!parsed.success) {
        throw ProtocolError.malformed(method, "unexpected result shape", parsed.error)
      }

      const value = shape(parsed.data)
      this.recordQuota(parsed.data, meta)

      this.logger.debug("request completed", {
        ...meta,
        durationMs: this.clock.nowMs() - startedAt,
        ...(parsed.data.bitsUsed !== undefined && { bitsUsed: parsed.data.bitsUsed }),
      })

      return value
    } catch (err) {
      this.logger.warn("request failed", {
        ...meta,
        durationMs: this.clock.nowMs() - startedAt,
        error: serializeError(err, { redact: [this.apiKey] }),
      })
      throw err
    }
  }

  private async send(body: string, signal: AbortSignal | undefined): Promise<HttpResponse> {
    try {
      return await this.transport.post({
        url: this.url,
        body,
        headers: { "content-type": "application/json", accept: "application/json" },
        timeoutMs: this.timeoutMs,
        ...(signal && { signal }),
      })
    } catch (err) {
      if (isAppError(err)) throw err
      throw TransportError.unreachable(this.url, err)
    }
  }

  private async waitForAdvisoryDelay(signal: AbortSignal | undefined): Promise<void> {
    if (!this.honorAdvisoryDelay) return

    const waitMs = this.nextDispatchAtMs - this.clock.nowMs()
    if (waitMs > 0) await this.clock.sleep(waitMs, signal)
  }

  private recordQuota(
    counters: WireCounters,
    meta: { module: string; rpcMethod: RpcMethod; rpcId: RequestId },
  ): void {
    if (counters.advisoryDelay !== undefined) {
      this.nextDispatchAtMs = this.clock.nowMs() + counters.advisoryDelay
    }

    const { bitsLeft, requestsLeft } = counters
    if (bitsLeft === undefined && requestsLeft === undefined) return

    this.quota = {
      ...(bitsLeft !== undefined && { bitsLeft }),
      ...(requestsLeft !== undefined && { requestsLeft }),
      observedAt: this.clock.now(),
    }

    if (
      this.warnBelowRequests > 0 &&
      requestsLeft !== undefined &&
      requestsLeft < this.warnBelowRequests
    ) {
      this.logger.warn("low request quota", {
        ...meta,
        requestsLeft,
        threshold: this.warnBelowRequests,
      })
    }

    if (this.warnBelowBits > 0 && bitsLeft !== undefined && bitsLeft < this.warnBelowBits) {
      this.logger.warn("low bit quota", { ...meta, bitsLeft, threshold: this.warnBelowBits })
    }
  }
}
