import {
  encodeBase64,
  readAttachmentContent,
} from "../../core/attachments/attachment-content"
import { resolveRecipient, resolveSender } from "../../core/address/resolve-address"
import type { Envelope } from "../../ports/envelope"
import type { Attachment, EmailMessage } from "../../ports/message"
import { getAttachmentUrl } from "./url-attachment"

export type FreesendUrlAttachment = {
  filename: string
  url: string
  contentType?: string
}

export type FreesendContentAttachment = {
  filename: string
  /** base64 */
  content: string
  contentType?: string
}

export type FreesendAttachment = FreesendUrlAttachment | FreesendContentAttachment

/**
 * Request body of the Freesend send-email endpoint.
 * @see {@link https://freesend.metafog.io/docs/api/send-email | Send Email API}
 */
export type FreesendPayload = {
  fromEmail: string
  fromName?: string
  to: string
  subject: string
  html?: string
  text?: string
  attachments?: FreesendAttachment[]
}

const DEFAULT_ATTACHMENT_FILENAME = "attachment"

/**
 * Translate a message into a Freesend request body.
 *
 * Freesend takes a single recipient: the first `to` address, else the first
 * envelope recipient. A body field is always present; `text` is sent empty
 * when the message has neither text nor html.
 *
 * @throws {MessageError} when no sender or recipient can be resolved.
 */
export function buildFreesendPayload(message: EmailMessage, envelope?: Envelope): FreesendPayload {
  const from = resolveSender(message, envelope)
  const to = resolveRecipient(message, envelope)
  const attachments = (message.attachments ?? []).map((a) => toFreesendAttachment(a))

  return {
    fromEmail: from.email,
    ...(from.name && { fromName: from.name }),
    to: to.email,
    subject: message.subject ?? "",
    ...(message.html && { html: message.html }),
    ...(message.text && { text: message.text }),
    ...(!message.html && !message.text && { text: "" }),
    ...(attachments.length > 0 && { attachments }),
  }
}

function toFreesendAttachment(attachment: Attachment): FreesendAttachment {
  const filename = attachment.filename || DEFAULT_ATTACHMENT_FILENAME
  const contentType = attachment.contentType ? { contentType: attachment.contentType } : {}
  const url = getAttachmentUrl(attachment)

  if (url !== undefined) {
    return { filename, url, ...contentType }
  }

  return {
    filename,
    content: encodeBase64(readAttachmentContent(attachment)),
    ...contentType,
  }
}
