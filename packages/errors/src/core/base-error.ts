import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Root of every error raised by the mail packages.
 *
 * Subclasses narrow `C` to their own codes and expose static factories:
 *
 * @example
 * ```ts
 * class MailerError extends BaseError<"mailer_not_defined"> {
 *   static notDefined(name: string) {
 *     return new MailerError(`Mailer [${name}] is not defined.`, {
 *       code: "mailer_not_defined",
 *       context: { mailer: name },
 *     })
 *   }
 * }
 * ```
 */
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
