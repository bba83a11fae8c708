/**
 * In-Memory Graph Store
 *
 * Core data structure for storing schema nodes and edges in memory.
 * Provides basic CRUD operations and the indexes the graph needs.
 */

import { InvalidStateError, NotFoundError, ShapeGraphError } from "shapegraph"
import type { NodeKind, SchemaEdge, SchemaNode } from "shapegraph"
import type { StoreData, StoreStats, TransactionSnapshot } from "./types"

/**
 * Deep clone a stored value. Connection sets survive the copy.
 */
function clone<T>(value: T): T {
  return structuredClone(value)
}

/**
 * In-memory graph store with support for:
 * - Node/edge CRUD operations
 * - Incident-edge lists for cascading deletes
 * - Kind-based node lookup
 * - Transaction support with rollback
 *
 * Values handed out are copies; changes go through the update methods.
 */
export class GraphStore {
  /** All nodes by ID */
  private nodes = new Map<string, SchemaNode>()

  /** All edges by ID */
  private edges = new Map<string, SchemaEdge>()

  /** Edges touching a node: nodeId -> Set<edgeId> */
  private incident = new Map<string, Set<string>>()

  /** Nodes by kind: kind -> Set<nodeId> */
  private nodesByKind = new Map<NodeKind, Set<string>>()

  /** Transaction state */
  private transactionSnapshot: TransactionSnapshot | null = null

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  /**
   * Create a new node.
   */
  createNode(node: SchemaNode): void {
    if (this.nodes.has(node.id)) {
      throw new InvalidStateError(`Node already exists: ${node.id}`, "DuplicateId")
    }

    this.nodes.set(node.id, clone(node))
    this.kindIndex(node.kind).add(node.id)
    this.incident.set(node.id, new Set())
  }

  /**
   * Get a node by ID.
   */
  getNode(id: string): SchemaNode | undefined {
    const node = this.nodes.get(id)
    return node ? clone(node) : undefined
  }

  /**
   * Update a node in place.
   * The updater receives the stored node; its id and kind are fixed.
   */
  updateNode(id: string, update: (node: SchemaNode) => void): void {
    const node = this.nodes.get(id)
    if (!node) {
      throw new NotFoundError("node", id)
    }
    update(node)
  }

  /**
   * Delete a node and every edge touching it.
   */
  deleteNode(id: string): void {
    const node = this.nodes.get(id)
    if (!node) return

    for (const edgeId of [...(this.incident.get(id) ?? [])]) {
      this.deleteEdge(edgeId)
    }

    this.nodesByKind.get(node.kind)?.delete(id)
    this.incident.delete(id)
    this.nodes.delete(id)
  }

  /**
   * Get all nodes of a kind, in insertion order.
   */
  getNodesByKind(kind: NodeKind): SchemaNode[] {
    const ids = this.nodesByKind.get(kind)
    if (!ids) return []
    return Array.from(ids)
      .map((id) => this.getNode(id))
      .filter((n): n is SchemaNode => n !== undefined)
  }

  /**
   * Count nodes of a kind without copying them.
   */
  countByKind(kind: NodeKind): number {
    return this.nodesByKind.get(kind)?.size ?? 0
  }

  /**
   * Get all nodes.
   */
  getAllNodes(): SchemaNode[] {
    return Array.from(this.nodes.values()).map(clone)
  }

  /**
   * Check if a node exists.
   */
  hasNode(id: string): boolean {
    return this.nodes.has(id)
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Create a new edge.
   */
  createEdge(edge: SchemaEdge): void {
    if (this.edges.has(edge.id)) {
      throw new InvalidStateError(`Edge already exists: ${edge.id}`, "DuplicateId")
    }
    if (!this.nodes.has(edge.from)) {
      throw new NotFoundError("node", edge.from)
    }
    if (!this.nodes.has(edge.to)) {
      throw new NotFoundError("node", edge.to)
    }

    this.edges.set(edge.id, clone(edge))
    this.incident.get(edge.from)?.add(edge.id)
    this.incident.get(edge.to)?.add(edge.id)
  }

  /**
   * Get an edge by ID.
   */
  getEdge(id: string): SchemaEdge | undefined {
    const edge = this.edges.get(id)
    return edge ? clone(edge) : undefined
  }

  /**
   * Update an edge's cardinality or order.
   */
  updateEdge(id: string, patch: { cardinality?: string; order?: number | null }): void {
    const edge = this.edges.get(id)
    if (!edge) {
      throw new NotFoundError("edge", id)
    }

    if (patch.cardinality !== undefined) edge.cardinality = patch.cardinality
    if (patch.order === null) delete edge.order
    else if (patch.order !== undefined) edge.order = patch.order
  }

  /**
   * Delete an edge.
   */
  deleteEdge(id: string): void {
    const edge = this.edges.get(id)
    if (!edge) return

    this.incident.get(edge.from)?.delete(id)
    this.incident.get(edge.to)?.delete(id)
    this.edges.delete(id)
  }

  /**
   * Find the edge from one node to another (directed).
   */
  findEdge(fromId: string, toId: string): SchemaEdge | undefined {
    for (const edgeId of this.incident.get(fromId) ?? []) {
      const edge = this.edges.get(edgeId)
      if (edge && edge.from === fromId && edge.to === toId) {
        return clone(edge)
      }
    }
    return undefined
  }

  /**
   * Get all edges, in insertion order.
   */
  getAllEdges(): SchemaEdge[] {
    return Array.from(this.edges.values()).map(clone)
  }

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  /**
   * Begin a transaction.
   */
  beginTransaction(): void {
    if (this.transactionSnapshot) {
      throw new ShapeGraphError("Transaction already in progress", "INVALID_STATE")
    }

    this.transactionSnapshot = {
      nodes: new Map(Array.from(this.nodes.entries()).map(([k, v]) => [k, clone(v)])),
      edges: new Map(Array.from(this.edges.entries()).map(([k, v]) => [k, clone(v)])),
      incident: new Map(Array.from(this.incident.entries()).map(([k, v]) => [k, new Set(v)])),
    }
  }

  /**
   * Commit the current transaction.
   */
  commit(): void {
    this.transactionSnapshot = null
  }

  /**
   * Rollback the current transaction.
   */
  rollback(): void {
    if (!this.transactionSnapshot) return

    this.nodes = this.transactionSnapshot.nodes
    this.edges = this.transactionSnapshot.edges
    this.incident = this.transactionSnapshot.incident
    this.rebuildKindIndex()

    this.transactionSnapshot = null
  }

  /**
   * Check if in a transaction.
   */
  inTransaction(): boolean {
    return this.transactionSnapshot !== null
  }

  /**
   * Run `fn` atomically: any throw restores the state from before the call.
   * Nested calls join the outer transaction.
   */
  transaction<T>(fn: () => T): T {
    if (this.inTransaction()) return fn()

    this.beginTransaction()
    try {
      const result = fn()
      this.commit()
      return result
    } catch (error) {
      this.rollback()
      throw error
    }
  }

  private rebuildKindIndex(): void {
    this.nodesByKind.clear()
    for (const node of this.nodes.values()) {
      this.kindIndex(node.kind).add(node.id)
    }
  }

  private kindIndex(kind: NodeKind): Set<string> {
    let ids = this.nodesByKind.get(kind)
    if (!ids) {
      ids = new Set()
      this.nodesByKind.set(kind, ids)
    }
    return ids
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Clear all data.
   */
  clear(): void {
    this.nodes.clear()
    this.edges.clear()
    this.incident.clear()
    this.nodesByKind.clear()
  }

  /**
   * Get store statistics.
   */
  stats(): StoreStats {
    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
      byKind: {
        Dataset: this.countByKind("Dataset"),
        Class: this.countByKind("Class"),
        Concept: this.countByKind("Concept"),
        DataElement: this.countByKind("DataElement"),
      },
    }
  }

  /**
   * Export store data.
   */
  export(): StoreData {
    return {
      nodes: this.getAllNodes(),
      edges: this.getAllEdges(),
    }
  }

  /**
   * Import data from export format.
   */
  import(data: StoreData): void {
    this.clear()
    for (const node of data.nodes) {
      this.createNode(node)
    }
    for (const edge of data.edges) {
      this.createEdge(edge)
    }
  }
}
