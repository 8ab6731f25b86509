export type LogContext = {
  service: string
  module: string
  env: string

  mailer: string
  transport: string
  endpoint: string
  /** Config source that supplied a value, e.g. `env` or `dotenv:.env`. */
  source: string

  messageId: string
  recipient: string
  attachments: number

  status: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta = Partial<LogContext> & Partial<LogEvent>

/**
 * Fields a child logger adds to, or overrides in, its parent's context.
 */
export type LogContextPatch = Partial<LogContext>
