import type { EmailAddress, EmailRecipient, EmailRecipients } from "../../ports/address"

export function toEmailAddress(recipient: EmailRecipient): EmailAddress {
  if (typeof recipient === "string") return { email: recipient }

  const hasName = recipient.name !== undefined && recipient.name.trim() !== ""

  return { email: recipient.email, ...(hasName && { name: recipient.name }) }
}

export function toAddressList(recipients: EmailRecipients | undefined): EmailAddress[] {
  if (recipients === undefined) return []

  const list = Array.isArray(recipients) ? recipients : [recipients]
  return list.map((r) => toEmailAddress(r))
}

/** Empty and whitespace-only addresses count as absent. */
export function isUsableAddress(address: EmailAddress): boolean {
  return address.email.trim() !== ""
}
