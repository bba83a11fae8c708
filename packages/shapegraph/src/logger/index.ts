/**
 * Logger Module
 */

export { createLogger, silentLogger } from "./logger"
export type { Logger, LogLevel, LoggerOptions } from "./logger"
