import { pino, type Logger } from "pino"

export type { Logger }

/**
 * Create the library logger.
 *
 * The library stays quiet unless asked: the level comes from `options.level`,
 * then `DATAPROC_LOG_LEVEL`, and defaults to `silent`.
 */
export function createLogger(options?: { level?: string }): Logger {
  return pino({
    name: "dataproc-client",
    level: options?.level ?? process.env["DATAPROC_LOG_LEVEL"] ?? "silent",
  })
}
