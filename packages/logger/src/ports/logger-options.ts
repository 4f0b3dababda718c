import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Keep off where logs are
   * collected as JSON.
   */
  prettify?: boolean
}
