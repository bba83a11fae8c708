/**
 * Constraint Merge
 */

import type { ConstraintSet } from "../schema/types"
import type { ConstraintFacts } from "./types"

export interface MergedConstraints {
  constraints: ConstraintSet
  datatype: string
}

/**
 * Apply facts on top of a node's constraints. Only fields present in
 * `facts` change; the inputs are left untouched.
 */
export function mergeConstraintFacts(
  constraints: ConstraintSet,
  datatype: string,
  facts: ConstraintFacts,
): MergedConstraints {
  const next: ConstraintSet = { ...constraints, inValues: [...constraints.inValues] }

  if (facts.pattern !== undefined) next.pattern = facts.pattern
  if (facts.minLength !== undefined) next.minLength = facts.minLength
  if (facts.maxLength !== undefined) next.maxLength = facts.maxLength
  if (facts.inValues !== undefined) next.inValues = [...facts.inValues]

  return { constraints: next, datatype: facts.datatype ?? datatype }
}
