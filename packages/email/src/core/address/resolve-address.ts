import type { EmailAddress } from "../../ports/address"
import type { Envelope } from "../../ports/envelope"
import type { EmailMessage } from "../../ports/message"
import { MessageError } from "./message-error"
import { isUsableAddress, toAddressList, toEmailAddress } from "./normalize-address"

/**
 * The message's `from`, else the envelope sender.
 *
 * @throws {MessageError} `missing_sender` when neither is usable.
 */
export function resolveSender(message: EmailMessage, envelope?: Envelope): EmailAddress {
  const candidates = [
    ...(message.from !== undefined ? [toEmailAddress(message.from)] : []),
    ...(envelope?.sender ? [toEmailAddress(envelope.sender)] : []),
  ]

  const sender = candidates.find(isUsableAddress)
  if (!sender) throw MessageError.missingSender()

  return sender
}

/**
 * The first usable `to` address, else the first usable envelope recipient.
 * Only one recipient is resolved; the rest of the list is not consulted.
 *
 * @throws {MessageError} `missing_recipient` when neither yields an address.
 */
export function resolveRecipient(message: EmailMessage, envelope?: Envelope): EmailAddress {
  const recipient =
    toAddressList(message.to).find(isUsableAddress) ??
    envelope?.recipients.find(isUsableAddress)

  if (!recipient) throw MessageError.missingRecipient()

  return recipient
}
