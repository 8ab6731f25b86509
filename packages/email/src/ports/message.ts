import type { EmailRecipient, EmailRecipients } from "./address"

export type AttachmentContent = Uint8Array | string

export type Attachment = {
  filename?: string

  /**
   * Raw bytes, a string (encoded as UTF-8) or a function producing either.
   * Functions are called once per send, when the content is needed.
   */
  content: AttachmentContent | (() => AttachmentContent)

  contentType?: string

  /**
   * Per-attachment headers, in insertion order. Names match case-insensitively.
   */
  headers?: Record<string, string>
}

export type EmailMessage = {
  /** Falls back to the envelope sender when absent. */
  from?: EmailRecipient

  /** Falls back to the envelope recipients when absent or empty. */
  to?: EmailRecipients
  cc?: EmailRecipients
  bcc?: EmailRecipients

  subject?: string

  text?: string
  html?: string

  attachments?: Attachment[]
}
