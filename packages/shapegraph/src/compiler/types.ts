/**
 * Compiler Type Definitions
 */

import type { IdCase } from "../text/naming"
import type { DuplicateContentWarning } from "../text/multilingual"

/**
 * A compiled shapes document.
 */
export interface CompiledShapes {
  /** Turtle text with the fixed prefix block */
  turtle: string
  datasetId: string
  /** Structure namespace bound to the `i14y` prefix */
  namespace: string
  warnings: DuplicateContentWarning[]
  meta: {
    triples: number
    nodeShapes: number
    propertyShapes: number
    lists: number
  }
}

/**
 * Options for the compiler.
 */
export interface CompilerOptions {
  /** Base of the structure namespace (default: https://www.i14y.admin.ch) */
  baseUri?: string
  datasetIdCase?: IdCase
  /** Emitted as pav:version and schema:version */
  schemaVersion?: string
  /** Clock for schema:validFrom */
  now?: () => Date
  /** Prefixes declared after the fixed block */
  extraPrefixes?: Record<string, string>
}
