/**
 * Logging
 *
 * Thin pino factory. Every logger carries the service name and the
 * component that produced the record.
 */

import { pino, type DestinationStream, type Logger as PinoLogger } from "pino"

export type Logger = PinoLogger

export type LogLevel = "silent" | "trace" | "debug" | "info" | "warn" | "error" | "fatal"

export interface LoggerOptions {
  /** Component name attached to every record */
  component: string
  /** Minimum level (default: SHAPEGRAPH_LOG_LEVEL or 'info') */
  level?: LogLevel
  /** Extra bindings for every record */
  base?: Record<string, unknown>
}

const SERVICE = "shapegraph"

/**
 * Create a component logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: 'TurtleCompiler' })
 * logger.warn({ subject, predicate }, 'Duplicate literal suppressed')
 * ```
 */
export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  const level = options.level ?? envLevel() ?? "info"

  return pino(
    {
      level,
      base: { service: SERVICE, component: options.component, ...options.base },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  )
}

/**
 * Logger that drops everything. Handy in tests.
 */
export function silentLogger(component = "silent"): Logger {
  return createLogger({ component, level: "silent" })
}

function envLevel(): LogLevel | undefined {
  const value = process.env.SHAPEGRAPH_LOG_LEVEL
  switch (value) {
    case "silent":
    case "trace":
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
      return value
    default:
      return undefined
  }
}
