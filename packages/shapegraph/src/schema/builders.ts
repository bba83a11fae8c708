/**
 * Schema Node Builders
 *
 * Factory functions for nodes and edges with their defaults applied.
 */

import { randomUUID } from "node:crypto"
import type {
  ConceptLinkage,
  ConstraintSet,
  LocalizedText,
  NodeKind,
  NodeOfKind,
  PropertyNode,
  SchemaEdge,
  SchemaNode,
} from "./types"

export const DEFAULT_DATATYPE = "xsd:string"
export const DEFAULT_CARDINALITY = "1..1"

/**
 * Generates node ids.
 */
export interface IdGenerator {
  generate(kind: NodeKind): string
}

export const defaultIdGenerator: IdGenerator = {
  generate: (kind) => `${kind.toLowerCase()}_${randomUUID()}`,
}

/**
 * A constraint set with nothing set.
 */
export function emptyConstraints(): ConstraintSet {
  return { inValues: [] }
}

/**
 * An unlinked concept linkage.
 */
export function emptyLinkage(): ConceptLinkage {
  return { linked: false }
}

/**
 * Fields shared by every node variant.
 */
export interface NodeInit {
  title?: LocalizedText
  description?: LocalizedText
  datatype?: string
  constraints?: ConstraintSet
}

/**
 * Creates a node of the given kind.
 *
 * @example
 * ```typescript
 * const concept = createNode('Concept', 'c1', { title: { de: 'Hund', en: 'Dog' } })
 * concept.linkage.linked // false
 * ```
 */
export function createNode<K extends NodeKind>(kind: K, id: string, init?: NodeInit): NodeOfKind<K>
export function createNode(kind: NodeKind, id: string, init: NodeInit = {}): SchemaNode {
  const base = {
    id,
    title: init.title ?? "",
    description: init.description ?? "",
    datatype: init.datatype ?? DEFAULT_DATATYPE,
    constraints: init.constraints ?? emptyConstraints(),
    connections: new Set<string>(),
  }

  switch (kind) {
    case "Dataset":
      return { ...base, kind, xoneGroups: [], datasetLinkage: { linked: false } }
    case "Class":
      return { ...base, kind }
    case "Concept":
      return { ...base, kind, linkage: emptyLinkage() }
    case "DataElement":
      return { ...base, kind, linkage: emptyLinkage() }
  }
}

/**
 * Derive the edge id from its ordered endpoint pair.
 *
 * `~` and `-` inside an endpoint are written as `~0` and `~1`, so distinct
 * pairs never share an id.
 *
 * @example
 * edgeId('ds', 'c1') // 'ds-c1'
 * edgeId('x-y', 'z') // 'x~1y-z'
 */
export function edgeId(from: string, to: string): string {
  return `${escapeEndpoint(from)}-${escapeEndpoint(to)}`
}

function escapeEndpoint(id: string): string {
  return id.replace(/~/g, "~0").replace(/-/g, "~1")
}

/**
 * Creates an edge record between two node ids.
 */
export function createEdge(
  from: string,
  to: string,
  cardinality: string = DEFAULT_CARDINALITY,
  order?: number,
): SchemaEdge {
  return order === undefined
    ? { id: edgeId(from, to), from, to, cardinality }
    : { id: edgeId(from, to), from, to, cardinality, order }
}

/**
 * Check whether a node becomes a datatype property shape.
 */
export function isPropertyNode(node: SchemaNode): node is PropertyNode {
  return node.kind === "Concept" || node.kind === "DataElement"
}
