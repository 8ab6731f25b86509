import type { LogContextPatch, LogMeta } from "./log-context"

export interface Logger {
  trace(message: string, meta?: LogMeta): void
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  fatal(message: string, meta?: LogMeta): void

  /**
   * Returns a logger whose entries carry the parent's context merged with
   * `context`. The parent is left untouched.
   */
  child(context: LogContextPatch): Logger
}
