export type ErrorCode = Lowercase<string>

/**
 * Structured data carried alongside an error, e.g. the HTTP status of a failed
 * send or the name of the mailer being built.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when sending the same message again might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus a programmer error (`false`).
   *
   * @remarks
   * A rejected API key or an unreachable endpoint is operational. A value of the
   * wrong shape reaching a transport is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
