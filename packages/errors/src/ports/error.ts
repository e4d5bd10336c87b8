export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (URLs, status codes, sizes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if issuing the same operation again might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, unreachable host),
   * `false` for bugs and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used for log payloads.
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
