import type { Logger } from "@mailport/logger"
import { createEnvelope } from "../envelope/create-envelope"
import type { Envelope } from "../../ports/envelope"
import type { EmailMessage } from "../../ports/message"
import type { EmailTransport, SendResult } from "../../ports/transport"

/**
 * A named, configured transport. Obtained from `MailManager.mailer()`.
 */
export class Mailer {
  constructor(
    readonly name: string,
    readonly transport: EmailTransport,
    private readonly logger: Logger,
  ) {}

  /**
   * Send `message` using `envelope`, or the envelope derived from its
   * `from`, `to`, `cc` and `bcc` fields. Transport errors are rethrown as-is.
   */
  async send(message: EmailMessage, envelope?: Envelope): Promise<SendResult> {
    const result = await this.transport.send(message, envelope ?? createEnvelope(message))

    this.logger.info("Email sent", {
      messageId: result.messageId,
      ...(result.accepted?.[0] !== undefined && { recipient: result.accepted[0] }),
    })

    return result
  }
}
