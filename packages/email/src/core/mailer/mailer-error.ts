import { BaseError } from "@mailport/errors"

export type MailerErrorCode = "mailer_not_defined" | "transport_not_registered"

export class MailerError extends BaseError<MailerErrorCode> {
  static notDefined(mailer: string): MailerError {
    return new MailerError(`Mailer [${mailer}] is not defined.`, {
      code: "mailer_not_defined",
      context: { mailer },
      isOperational: false,
    })
  }

  static transportNotRegistered(mailer: string, transport: string): MailerError {
    return new MailerError(`Unsupported mail transport [${transport}].`, {
      code: "transport_not_registered",
      context: { mailer, transport },
      isOperational: false,
    })
  }
}
