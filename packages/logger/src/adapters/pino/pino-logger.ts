import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Existing pino logger to derive from. Only `bindings` are added to it.
   */
  base?: PinoLoggerBase

  /**
   * Where JSON lines are written. Ignored when `prettify` is on, since
   * pino-pretty owns its own output.
   */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
  ) {
    this.logger = this.init(bindings)
  }

  private init(bindings: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
    }

    if (this.opts.prettify) {
      return pino({
        ...pinoOpts,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }).child(bindings)
    }

    const base = this.deps.destination
      ? pino(pinoOpts, this.deps.destination)
      : pino(pinoOpts)

    return base.child(bindings)
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message)
  }

  child(context: LogContextPatch): Logger {
    return new PinoLogger({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger(
  opts?: Partial<LoggerOptions>,
  bindings?: LogContextPatch,
): Logger {
  return new PinoLogger({}, opts, bindings)
}
