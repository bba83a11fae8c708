/**
 * Constraints Module
 *
 * Constraint sources and the glue that merges their facts into a node.
 */

export { RecordConstraintSource, mapDatatypeHint, codelistValue, codelistValues } from "./record-source"
export { RemoteConstraintSource } from "./remote-source"
export { mergeConstraintFacts } from "./merge"
export type { MergedConstraints } from "./merge"
export type { ConstraintFacts, ConstraintSource } from "./types"
