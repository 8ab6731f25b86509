import type { EmailMessage } from "../../../ports/message"
import { MessageError } from "../message-error"
import { resolveRecipient, resolveSender } from "../resolve-address"

function message(overrides: Partial<EmailMessage> = {}): EmailMessage {
  return {
    from: { email: "sender@example.com", name: "Sender" },
    to: "recipient@example.com",
    subject: "Test",
    ...overrides,
  }
}

describe("resolveSender", () => {
  it("prefers the message from address", () => {
    const sender = resolveSender(message(), {
      sender: { email: "bounce@example.com" },
      recipients: [],
    })

    expect(sender).toEqual({ email: "sender@example.com", name: "Sender" })
  })

  it("accepts a bare string address", () => {
    expect(resolveSender(message({ from: "plain@example.com" }))).toEqual({
      email: "plain@example.com",
    })
  })

  it("falls back to the envelope sender", () => {
    const sender = resolveSender(message({ from: undefined }), {
      sender: { email: "bounce@example.com" },
      recipients: [],
    })

    expect(sender).toEqual({ email: "bounce@example.com" })
  })

  it("skips a blank from address", () => {
    const sender = resolveSender(message({ from: "  " }), {
      sender: { email: "bounce@example.com" },
      recipients: [],
    })

    expect(sender.email).toBe("bounce@example.com")
  })

  it("throws missing_sender when nothing is usable", () => {
    expect(() => resolveSender(message({ from: undefined }))).toThrow(MessageError)
    expect(() => resolveSender(message({ from: undefined }))).toThrow(
      "No sender address provided",
    )
  })
})

describe("resolveRecipient", () => {
  it("uses the first to address regardless of the envelope", () => {
    const recipient = resolveRecipient(
      message({ to: ["first@example.com", "second@example.com"] }),
      { recipients: [{ email: "envelope@example.com" }] },
    )

    expect(recipient.email).toBe("first@example.com")
  })

  it("falls back to the first envelope recipient when to is empty", () => {
    const recipient = resolveRecipient(message({ to: [] }), {
      recipients: [{ email: "hidden@example.com" }, { email: "other@example.com" }],
    })

    expect(recipient.email).toBe("hidden@example.com")
  })

  it("treats whitespace-only addresses as absent", () => {
    const recipient = resolveRecipient(message({ to: [" ", ""] }), {
      recipients: [{ email: "" }, { email: "fallback@example.com" }],
    })

    expect(recipient.email).toBe("fallback@example.com")
  })

  it("throws missing_recipient when both are empty", () => {
    let caught: unknown

    try {
      resolveRecipient(message({ to: undefined }), { recipients: [] })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(MessageError)
    expect(caught).toMatchObject({
      code: "missing_recipient",
      message: "No recipient address provided",
      isRetryable: false,
    })
  })
})
