import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /**
   * Minimum level to emit; anything below is dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production so
   * log processors receive one JSON object per line.
   */
  prettify?: boolean
}
