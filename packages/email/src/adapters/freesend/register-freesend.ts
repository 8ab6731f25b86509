import type { MailManager } from "../../core/mailer/mail-manager"
import type { HttpClient } from "../../ports/http-client"
import {
  type FreesendPackageConfig,
  parseFreesendMailerConfig,
  resolveFreesendOptions,
} from "./freesend-config"
import { FreesendTransport } from "./freesend-transport"

export type RegisterFreesendOptions = {
  config: FreesendPackageConfig
  /** Shared by every Freesend mailer. @default FetchHttpClient */
  http?: HttpClient
}

/**
 * Make `transport: "freesend"` available to the manager's mailers. Options are
 * resolved, and missing ones reported, when a mailer is first built.
 */
export function registerFreesendTransport(
  manager: MailManager,
  { config, http }: RegisterFreesendOptions,
): MailManager {
  return manager.extend("freesend", (mailerConfig, { mailer, logger }) => {
    const options = resolveFreesendOptions(
      mailer,
      parseFreesendMailerConfig(mailer, mailerConfig),
      config,
    )

    return new FreesendTransport(options, { ...(http && { http }), logger })
  })
}
