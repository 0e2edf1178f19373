import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino"

export type { Logger }

export type LogLevel = "silent" | "trace" | "debug" | "info" | "warn" | "error" | "fatal"

export interface LoggerConfig {
  level?: LogLevel
  /** Bindings included in every record */
  base?: Record<string, unknown>
  /** Destination stream; stdout when omitted */
  destination?: DestinationStream
}

/**
 * Library code logs nothing unless the caller passes a logger
 * or builds one with a level.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: config.level ?? "silent",
    base: { service: "docweave", ...config.base },
  }
  return config.destination ? pino(options, config.destination) : pino(options)
}

export const silentLogger: Logger = createLogger()
