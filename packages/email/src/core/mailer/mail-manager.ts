import { createNullLogger, type Logger } from "@mailport/logger"
import type { MailConfig, TransportFactory } from "./mailer-config"
import { Mailer } from "./mailer"
import { MailerError } from "./mailer-error"

export type MailManagerDeps = {
  logger?: Logger
}

/**
 * Registry of transport factories and resolver of configured mailers.
 *
 * @example
 * ```ts
 * const manager = new MailManager(config, { logger })
 * registerFreesendTransport(manager, { config: await loadFreesendConfig() })
 *
 * await manager.mailer().send({ from: "app@example.com", to: "user@example.com", text: "Hi" })
 * ```
 */
export class MailManager {
  private readonly factories = new Map<string, TransportFactory>()
  private readonly mailers = new Map<string, Mailer>()
  private readonly logger: Logger

  constructor(
    private readonly config: MailConfig,
    deps: MailManagerDeps = {},
  ) {
    this.logger = deps.logger ?? createNullLogger()
  }

  /**
   * Register the factory for `transport`. Replaces an existing one; mailers
   * already built keep their transport until {@link purge}d.
   */
  extend(transport: string, factory: TransportFactory): this {
    this.factories.set(transport, factory)
    return this
  }

  hasTransport(transport: string): boolean {
    return this.factories.has(transport)
  }

  /**
   * The mailer named `name`, or the default one. Built on first use and cached;
   * a mailer whose construction throws is not cached.
   *
   * @throws {MailerError} when the mailer or its transport is unknown.
   */
  mailer(name: string = this.config.default): Mailer {
    const cached = this.mailers.get(name)
    if (cached) return cached

    const mailer = this.resolve(name)

    this.mailers.set(name, mailer)
    return mailer
  }

  /** Forget a built mailer, or all of them. */
  purge(name?: string): void {
    if (name === undefined) {
      this.mailers.clear()
      return
    }

    this.mailers.delete(name)
  }

  private resolve(name: string): Mailer {
    const config = this.config.mailers[name]
    if (!config) throw MailerError.notDefined(name)

    const factory = this.factories.get(config.transport)
    if (!factory) throw MailerError.transportNotRegistered(name, config.transport)

    const logger = this.logger.child({ mailer: name, transport: config.transport })
    const transport = factory(config, { mailer: name, logger })

    return new Mailer(name, transport, logger)
  }
}
