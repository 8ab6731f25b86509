import type { SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
}>

/**
 * Serialize a thrown value for logging.
 *
 * AppErrors keep their code and context. Plain errors get code `"unknown"` and
 * are treated as non-operational. Anything else is wrapped as `NonErrorThrown`.
 * Causes are serialized recursively.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (isAppError(err)) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      isRetryable: err.isRetryable,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      isRetryable: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    isRetryable: false,
    timestamp: new Date().toISOString(),
  }
}
