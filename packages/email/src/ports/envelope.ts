import type { EmailAddress } from "./address"

/**
 * Transport-level sender and recipients. These may differ from the visible
 * headers, e.g. a message addressed only by bcc.
 */
export type Envelope = {
  sender?: EmailAddress
  recipients: EmailAddress[]
}
