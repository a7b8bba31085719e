export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (method names, ids, remote codes).
 * Never put credentials here.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if sending the same call again might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, network down, quota spent),
   * `false` for programmer errors and broken invariants.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log serializers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
