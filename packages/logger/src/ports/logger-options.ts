import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance: which levels are emitted and how they render.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Render human-readable lines instead of JSON.
   *
   * @remarks
   * Meant for local development; leave off where logs are shipped to a
   * collector.
   */
  prettify?: boolean
}
