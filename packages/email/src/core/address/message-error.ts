import { BaseError } from "@mailport/errors"

export type MessageErrorCode = "missing_recipient" | "missing_sender"

/**
 * The message cannot be addressed. Raised before anything is sent.
 */
export class MessageError extends BaseError<MessageErrorCode> {
  static missingRecipient(): MessageError {
    return new MessageError("No recipient address provided", { code: "missing_recipient" })
  }

  static missingSender(): MessageError {
    return new MessageError("No sender address provided", { code: "missing_sender" })
  }
}
