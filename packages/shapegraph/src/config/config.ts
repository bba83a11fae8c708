/**
 * Runtime Configuration
 *
 * Values come from defaults, then SHAPEGRAPH_* environment variables,
 * then explicit overrides. The merged result is validated with zod.
 */

import { z } from "zod"
import { ValidationError } from "../errors"

export const configSchema = z.object({
  /** Base of the structure namespace: `<baseUri>/resources/datasets/<id>/structure/` */
  baseUri: z.string().url().default("https://www.i14y.admin.ch"),
  /** Base of canonical concept IRIs: `<conceptBaseUri>/<id>/description` */
  conceptBaseUri: z.string().url().default("https://www.i14y.admin.ch/catalog/concepts"),
  /** Base of catalogue dataset IRIs: `<datasetBaseUri>/<id>/description` */
  datasetBaseUri: z.string().url().default("https://www.i14y.admin.ch/catalog/datasets"),
  /** Catalogue search API */
  lookupBaseUrl: z.string().url().default("https://input.i14y.admin.ch/api/Catalog"),
  /** Public concept API (details, codelists) */
  publicApiBaseUrl: z.string().url().default("https://api.i14y.admin.ch/api/public/v1"),
  /** Bound on every remote lookup request */
  lookupTimeoutMs: z.number().int().positive().default(10_000),
  /** Casing applied to the dataset identifier */
  datasetIdCase: z.enum(["lower", "upper"]).default("lower"),
  /** Emitted as pav:version and schema:version */
  schemaVersion: z.string().min(1).default("1.0.0"),
  /** Idle time after which a session is evicted */
  sessionTtlMs: z.number().int().positive().default(30 * 60 * 1000),
  /** Interval of the eviction sweep */
  sessionSweepIntervalMs: z.number().int().positive().default(60_000),
  /** Maximum number of live sessions */
  maxSessions: z.number().int().positive().default(1000),
  logLevel: z.enum(["silent", "trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
})

export type ShapeGraphConfig = z.infer<typeof configSchema>
export type ShapeGraphConfigInput = z.input<typeof configSchema>

const ENV_KEYS: Record<keyof ShapeGraphConfig, string> = {
  baseUri: "SHAPEGRAPH_BASE_URI",
  conceptBaseUri: "SHAPEGRAPH_CONCEPT_BASE_URI",
  datasetBaseUri: "SHAPEGRAPH_DATASET_BASE_URI",
  lookupBaseUrl: "SHAPEGRAPH_LOOKUP_BASE_URL",
  publicApiBaseUrl: "SHAPEGRAPH_PUBLIC_API_BASE_URL",
  lookupTimeoutMs: "SHAPEGRAPH_LOOKUP_TIMEOUT_MS",
  datasetIdCase: "SHAPEGRAPH_DATASET_ID_CASE",
  schemaVersion: "SHAPEGRAPH_SCHEMA_VERSION",
  sessionTtlMs: "SHAPEGRAPH_SESSION_TTL_MS",
  sessionSweepIntervalMs: "SHAPEGRAPH_SESSION_SWEEP_INTERVAL_MS",
  maxSessions: "SHAPEGRAPH_MAX_SESSIONS",
  logLevel: "SHAPEGRAPH_LOG_LEVEL",
}

const NUMERIC_KEYS = new Set<string>([
  "lookupTimeoutMs",
  "sessionTtlMs",
  "sessionSweepIntervalMs",
  "maxSessions",
])

/**
 * Load configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param overrides - Values that win over the environment
 * @throws ValidationError if a value is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ShapeGraphConfigInput = {},
): ShapeGraphConfig {
  const fromEnv: Record<string, unknown> = {}

  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey]
    if (raw === undefined || raw.trim() === "") continue
    fromEnv[key] = NUMERIC_KEYS.has(key) ? Number(raw.trim()) : raw.trim()
  }

  const result = configSchema.safeParse({ ...fromEnv, ...overrides })
  if (!result.success) {
    const issue = result.error.errors[0]
    const field = issue?.path.join(".")
    throw new ValidationError(
      `Invalid configuration${field ? ` for ${field}` : ""}: ${issue?.message ?? "validation failed"}`,
      field,
    )
  }
  return result.data
}

/**
 * Default configuration, ignoring the environment.
 */
export function defaultConfig(): ShapeGraphConfig {
  return configSchema.parse({})
}
