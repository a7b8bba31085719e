import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean

  /**
   * Strings that must not survive serialization (API keys, tokens).
   * Every occurrence in messages, stacks and string context values is
   * replaced with `[redacted]`. Strings shorter than
   * {@link MIN_REDACT_LENGTH} are ignored; they would match ordinary text.
   */
  redact?: readonly string[]
}>

const REDACTED = "[redacted]"

export const MIN_REDACT_LENGTH = 6

function scrub(text: string, secrets: readonly string[]): string {
  let out = text
  for (const secret of secrets) {
    out = out.split(secret).join(REDACTED)
  }
  return out
}

function scrubValue(value: unknown, secrets: readonly string[]): unknown {
  if (secrets.length === 0) return value
  if (typeof value === "string") return scrub(value, secrets)
  if (Array.isArray(value)) return value.map((v) => scrubValue(v, secrets))
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    const out: Record<string, unknown> = {}
    for (const [key, v] of Object.entries(value)) {
      out[key] = scrubValue(v, secrets)
    }
    return out
  }
  return value
}

function scrubContext(
  context: Readonly<Record<string, unknown>>,
  secrets: readonly string[],
): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(context)) {
    out[key] = scrubValue(value, secrets)
  }
  return out
}

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * - BaseError instances keep code, context and flags
 * - Other Error instances get code "unknown" and `isOperational: false`
 * - Non-Error thrown values are wrapped with the value in context
 */
export function serializeError(
  err: unknown,
  options?: SerializeOptions,
): SerializedError {
  const includeStack = options?.includeStack ?? false
  const secrets = (options?.redact ?? []).filter((s) => s.length >= MIN_REDACT_LENGTH)

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: scrub(err.message, secrets),
      context: scrubContext(err.context, secrets),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: scrub(err.stack, secrets) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: scrub(err.message, secrets),
      context: {},
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: scrub(err.stack, secrets) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? scrub(err, secrets) : "Unknown error",
    context: { value: scrubValue(err, secrets) },
    isRetryable: false,
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
