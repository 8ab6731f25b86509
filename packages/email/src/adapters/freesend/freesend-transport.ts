import { randomUUID } from "node:crypto"
import { createNullLogger, type Logger } from "@mailport/logger"
import { createEnvelope } from "../../core/envelope/create-envelope"
import { FetchHttpClient } from "../http/fetch-http-client"
import type { Envelope } from "../../ports/envelope"
import type { HttpClient, HttpResponse } from "../../ports/http-client"
import type { EmailMessage } from "../../ports/message"
import type { EmailTransport, SendResult } from "../../ports/transport"
import type { FreesendTransportOptions } from "./freesend-config"
import { FreesendError } from "./freesend-error"
import { buildFreesendPayload } from "./freesend-payload"

export type FreesendTransportDeps = {
  /** @default FetchHttpClient */
  http?: HttpClient
  logger?: Logger
}

/**
 * Sends mail through the Freesend HTTP API, one POST per message.
 *
 * Only a 200 response counts as accepted. There are no retries; a failed send
 * surfaces as a {@link FreesendError} (or a `MessageError` when the message
 * cannot be addressed, in which case no request is made).
 *
 * @see {@link https://freesend.metafog.io/docs/api/send-email | Send Email API}
 */
export class FreesendTransport implements EmailTransport {
  readonly name = "freesend"

  private readonly http: HttpClient
  private readonly logger: Logger

  constructor(
    private readonly options: FreesendTransportOptions,
    deps: FreesendTransportDeps = {},
  ) {
    this.http = deps.http ?? new FetchHttpClient()
    this.logger = deps.logger ?? createNullLogger()
  }

  async send(message: EmailMessage, envelope?: Envelope): Promise<SendResult> {
    const payload = buildFreesendPayload(message, envelope ?? createEnvelope(message))
    const { endpoint } = this.options
    const meta = {
      endpoint,
      recipient: payload.to,
      attachments: payload.attachments?.length ?? 0,
    }

    this.logger.debug("Sending email via Freesend", meta)
    const startedAt = Date.now()

    const response = await this.post(JSON.stringify(payload))
    // Always consumed, so the connection is released.
    const body = await this.readBody(response)

    if (response.status !== 200) {
      const err = FreesendError.apiError(response.status, body)

      this.logger.warn("Freesend rejected email", { ...meta, status: response.status, err })
      throw err
    }

    const messageId = randomUUID()

    this.logger.debug("Freesend accepted email", {
      ...meta,
      messageId,
      status: response.status,
      durationMs: Date.now() - startedAt,
    })

    return {
      provider: this.name,
      messageId,
      accepted: [payload.to],
    }
  }

  toString(): string {
    return this.name
  }

  private async post(body: string): Promise<HttpResponse> {
    const { apiKey, endpoint, timeoutMs } = this.options

    try {
      return await this.http.post(endpoint, {
        headers: {
          Authorization: `Bearer ${apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body,
        timeoutMs,
      })
    } catch (cause) {
      throw this.networkError(cause)
    }
  }

  private async readBody(response: HttpResponse): Promise<string> {
    try {
      return await response.text()
    } catch (cause) {
      throw this.networkError(cause)
    }
  }

  private networkError(cause: unknown): FreesendError {
    const err = FreesendError.networkError(cause, this.options.endpoint)

    this.logger.error("Freesend request failed", { endpoint: this.options.endpoint, err })
    return err
  }
}
