import type { Envelope } from "./envelope"
import type { EmailMessage } from "./message"

export type SendResult = {
  provider: string
  messageId: string

  accepted?: string[]
}

export interface EmailTransport {
  /** Stable identifier shown in logs and by the mailer registry. */
  readonly name: string

  send(message: EmailMessage, envelope?: Envelope): Promise<SendResult>
}
