/**
 * In-Memory Graph Store Types
 *
 * Core data structures for the in-memory schema graph.
 */

import type { NodeKind, SchemaEdge, SchemaNode } from "shapegraph"

/**
 * Transaction snapshot for rollback support.
 */
export interface TransactionSnapshot {
  nodes: Map<string, SchemaNode>
  edges: Map<string, SchemaEdge>
  incident: Map<string, Set<string>>
}

/**
 * Store statistics.
 */
export interface StoreStats {
  nodes: number
  edges: number
  byKind: Record<NodeKind, number>
}

/**
 * Export format of a store: nodes and edges in insertion order.
 */
export interface StoreData {
  nodes: SchemaNode[]
  edges: SchemaEdge[]
}
