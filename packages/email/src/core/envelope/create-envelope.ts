import type { Envelope } from "../../ports/envelope"
import type { EmailMessage } from "../../ports/message"
import { isUsableAddress, toAddressList, toEmailAddress } from "../address/normalize-address"

/**
 * Derive the envelope a message would be delivered with: the `from` address as
 * sender and every `to`, `cc` and `bcc` address as a recipient, in that order.
 * Blank addresses are dropped.
 */
export function createEnvelope(message: EmailMessage): Envelope {
  const sender = message.from !== undefined ? toEmailAddress(message.from) : undefined

  const recipients = [
    ...toAddressList(message.to),
    ...toAddressList(message.cc),
    ...toAddressList(message.bcc),
  ].filter(isUsableAddress)

  return {
    ...(sender && isUsableAddress(sender) && { sender }),
    recipients,
  }
}
