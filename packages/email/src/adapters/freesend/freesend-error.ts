import { BaseError } from "@mailport/errors"

export type FreesendErrorCode =
  | "missing_api_key"
  | "missing_endpoint"
  | "api_error"
  | "network_error"

export class FreesendError extends BaseError<FreesendErrorCode> {
  static missingApiKey(mailer: string): FreesendError {
    return new FreesendError("Freesend API key is not configured.", {
      code: "missing_api_key",
      context: { mailer },
      isOperational: false,
    })
  }

  static missingEndpoint(mailer: string): FreesendError {
    return new FreesendError("Freesend endpoint is not configured.", {
      code: "missing_endpoint",
      context: { mailer },
      isOperational: false,
    })
  }

  /**
   * Any status other than 200. The body is kept verbatim; Freesend's error
   * format is not interpreted.
   */
  static apiError(status: number, body: string): FreesendError {
    return new FreesendError(`Freesend API returned status ${status}: ${body}`, {
      code: "api_error",
      context: { status, body },
      isRetryable: status === 429 || status >= 500,
    })
  }

  /**
   * `fetch` rejects with a generic "fetch failed" and keeps the socket error
   * on its own `cause`, so one nested reason is appended when present.
   */
  static networkError(cause: unknown, endpoint: string): FreesendError {
    const reason = describeCause(cause)

    return new FreesendError(`Failed to send email via Freesend: ${reason}`, {
      code: "network_error",
      context: { endpoint },
      cause,
      isRetryable: true,
    })
  }
}

function describeCause(cause: unknown): string {
  if (!(cause instanceof Error)) return String(cause)
  if (!(cause.cause instanceof Error)) return cause.message

  return `${cause.message} (${cause.cause.message})`
}
