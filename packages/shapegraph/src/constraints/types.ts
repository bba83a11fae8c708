/**
 * Constraint Source Types
 */

import type { ConceptRecord } from "../lookup/schemas"

/**
 * Constraint facts derived from an external concept.
 * A missing field means the source had nothing to say about it.
 */
export interface ConstraintFacts {
  pattern?: string
  inValues?: string[]
  datatype?: string
  minLength?: number
  maxLength?: number
}

/**
 * Derives constraint facts from a catalogue record.
 * Implementations resolve with `{}` instead of rejecting.
 */
export interface ConstraintSource {
  readonly name: string
  extract(record: ConceptRecord): Promise<ConstraintFacts>
}
