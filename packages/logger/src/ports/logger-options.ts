import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Production should keep the
   * default JSON lines.
   */
  prettify?: boolean
}
