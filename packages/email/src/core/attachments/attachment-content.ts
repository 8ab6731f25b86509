import type { Attachment } from "../../ports/message"

/**
 * Case-insensitive header lookup. The first matching header wins.
 */
export function getAttachmentHeader(attachment: Attachment, name: string): string | undefined {
  const wanted = name.toLowerCase()

  for (const [key, value] of Object.entries(attachment.headers ?? {})) {
    if (key.toLowerCase() === wanted) return value
  }

  return undefined
}

export function readAttachmentContent(attachment: Attachment): Uint8Array {
  const content =
    typeof attachment.content === "function" ? attachment.content() : attachment.content

  return typeof content === "string" ? new TextEncoder().encode(content) : content
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64")
}
