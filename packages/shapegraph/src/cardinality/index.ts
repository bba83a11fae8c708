/**
 * Cardinality Module
 */

export { parseCardinality, formatCardinality, hasBounds } from "./codec"
export type { CardinalityBounds } from "./codec"
