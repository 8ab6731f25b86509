import { getAttachmentHeader } from "../../core/attachments/attachment-content"
import type { Attachment } from "../../ports/message"

/**
 * Attachment header carrying the URL Freesend should fetch the file from.
 * When present with a non-blank value, the attachment's content is ignored.
 */
export const URL_ATTACHMENT_HEADER = "X-Freesend-Url"

/**
 * Create an attachment that Freesend downloads from `url` instead of receiving
 * inline. It is an ordinary {@link Attachment} with empty content, so it passes
 * through code that only knows about attachments unchanged.
 *
 * The URL is not validated here. Freesend only fetches HTTP(S) URLs, and an
 * unreachable one fails the send on the remote side.
 *
 * @param contentType - MIME type; when omitted Freesend detects it.
 *
 * @example
 * ```ts
 * await mailer.send({
 *   from: "billing@example.com",
 *   to: "customer@example.com",
 *   subject: "Your invoice",
 *   text: "Attached.",
 *   attachments: [
 *     urlAttachment("https://files.example.com/inv-42.pdf", "invoice.pdf", "application/pdf"),
 *   ],
 * })
 * ```
 */
export function urlAttachment(url: string, filename: string, contentType?: string): Attachment {
  return {
    filename,
    content: new Uint8Array(),
    ...(contentType !== undefined && { contentType }),
    headers: { [URL_ATTACHMENT_HEADER]: url },
  }
}

/**
 * The URL an attachment was marked with, or `undefined` for a content attachment.
 */
export function getAttachmentUrl(attachment: Attachment): string | undefined {
  const url = getAttachmentHeader(attachment, URL_ATTACHMENT_HEADER)

  return url !== undefined && url.trim() !== "" ? url : undefined
}
