/**
 * Config Module
 */

export { configSchema, loadConfig, defaultConfig } from "./config"
export type { ShapeGraphConfig, ShapeGraphConfigInput } from "./config"
