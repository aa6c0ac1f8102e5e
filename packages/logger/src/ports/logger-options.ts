import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by all adapters.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print for local development instead of JSON lines.
   */
  prettify?: boolean
}
