import { randomUUID } from "node:crypto"
import { createEnvelope } from "../../core/envelope/create-envelope"
import { resolveRecipient } from "../../core/address/resolve-address"
import type { Envelope } from "../../ports/envelope"
import type { EmailMessage } from "../../ports/message"
import type { EmailTransport, SendResult } from "../../ports/transport"

export type SentEmail = {
  message: EmailMessage
  envelope: Envelope
  result: SendResult
}

/**
 * Keeps messages in memory instead of delivering them. Meant for tests and
 * local development.
 */
export class MemoryTransport implements EmailTransport {
  readonly name = "memory"

  readonly sent: SentEmail[] = []

  async send(message: EmailMessage, envelope?: Envelope): Promise<SendResult> {
    const derived = envelope ?? createEnvelope(message)
    const resolved =
      derived.recipients.length > 0
        ? derived
        : { ...derived, recipients: [resolveRecipient(message, derived)] }

    const result: SendResult = {
      provider: this.name,
      messageId: randomUUID(),
      accepted: resolved.recipients.map((r) => r.email),
    }

    this.sent.push({ message, envelope: resolved, result })
    return result
  }

  clear(): void {
    this.sent.length = 0
  }

  toString(): string {
    return this.name
  }
}
