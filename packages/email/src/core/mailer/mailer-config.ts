import type { Logger } from "@mailport/logger"
import type { EmailTransport } from "../../ports/transport"

/**
 * One entry under `mailers`. `transport` selects the factory; every other key
 * belongs to that transport.
 */
export type MailerConfig = {
  transport: string
  [option: string]: unknown
}

export type MailConfig = {
  /** Mailer used when none is named. */
  default: string
  mailers: Record<string, MailerConfig>
}

export type TransportFactoryContext = {
  mailer: string
  /** Already bound to `mailer` and `transport`. */
  logger: Logger
}

export type TransportFactory = (
  config: MailerConfig,
  context: TransportFactoryContext,
) => EmailTransport
