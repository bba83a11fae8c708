/**
 * Core Schema Graph Type Definitions
 *
 * These types define the structure of a schema graph: one dataset, the
 * classes it groups, and the concepts / data elements that become
 * SHACL property shapes.
 *
 * IMPORTANT: Every node has an immutable `id`. Connections are symmetric and
 * each connection is mirrored by exactly one edge record.
 */

// =============================================================================
// LANGUAGES & TEXT
// =============================================================================

/**
 * Languages a title or description may be written in.
 */
export const LANGUAGES = ["de", "en", "fr", "it", "rm"] as const

export type Language = (typeof LANGUAGES)[number]

/**
 * A title or description: either plain text or one text per language.
 */
export type LocalizedText = string | Partial<Record<Language, string>>

// =============================================================================
// NODE KINDS
// =============================================================================

/**
 * The fixed set of schema elements.
 * - 'Dataset': the root shape (exactly one per graph)
 * - 'Class': a nested node shape grouping properties
 * - 'Concept': a property linked (or linkable) to an external concept
 * - 'DataElement': a free-standing property
 */
export const NODE_KINDS = ["Dataset", "Class", "Concept", "DataElement"] as const

export type NodeKind = (typeof NODE_KINDS)[number]

/**
 * Kinds that are emitted as datatype property shapes.
 */
export type PropertyKind = "Concept" | "DataElement"

// =============================================================================
// CONSTRAINTS
// =============================================================================

/**
 * SHACL constraint facts stored on a node.
 * Absent numbers mean "unset"; an empty `inValues` means "no enumeration".
 */
export interface ConstraintSet {
  minCount?: number
  maxCount?: number
  minLength?: number
  maxLength?: number
  pattern?: string
  /** Enumeration values, in the order they are emitted */
  inValues: string[]
  /** IRI of a node shape referenced with sh:node */
  nodeReference?: string
  /** IRI emitted as rdfs:range */
  range?: string
  /** Sort key among siblings */
  order?: number
}

// =============================================================================
// NODES
// =============================================================================

/**
 * Link between a property node and an external concept.
 */
export interface ConceptLinkage {
  /** Whether the node is currently linked to an external concept */
  linked: boolean
  /** Identifier of the concept in the external catalogue */
  conceptId?: string
  /** Canonical concept IRI, emitted as dcterms:conformsTo */
  conceptUri?: string
  /** Raw record from the catalogue, passed through unchanged */
  external?: unknown
}

/**
 * Link between the dataset and an entry of the external catalogue.
 */
export interface DatasetLinkage {
  linked: boolean
  /** Identifier of the catalogue dataset */
  datasetId?: string
  datasetUri?: string
  /** Raw record from the catalogue, passed through unchanged */
  external?: unknown
}

interface BaseNode {
  /** Unique identifier, immutable */
  readonly id: string
  title: LocalizedText
  description: LocalizedText
  /** XSD datatype reference, e.g. `xsd:string` */
  datatype: string
  constraints: ConstraintSet
  /** Ids of connected nodes (always symmetric) */
  connections: Set<string>
}

export interface DatasetNode extends BaseNode {
  readonly kind: "Dataset"
  /** Groups of dataset-level property node ids emitted as sh:xone */
  xoneGroups: string[][]
  datasetLinkage: DatasetLinkage
}

export interface ClassNode extends BaseNode {
  readonly kind: "Class"
}

export interface ConceptNode extends BaseNode {
  readonly kind: "Concept"
  linkage: ConceptLinkage
}

export interface DataElementNode extends BaseNode {
  readonly kind: "DataElement"
  linkage: ConceptLinkage
}

/**
 * Any schema node, discriminated on `kind`.
 */
export type SchemaNode = DatasetNode | ClassNode | ConceptNode | DataElementNode

/**
 * Nodes that become datatype property shapes.
 */
export type PropertyNode = ConceptNode | DataElementNode

/**
 * Narrow a node to the variant of the given kind.
 */
export type NodeOfKind<K extends NodeKind> = Extract<SchemaNode, { kind: K }>

// =============================================================================
// EDGES
// =============================================================================

/**
 * Edge record mirroring a connection.
 * The id is derived from the ordered endpoint pair: `${from}-${to}`.
 */
export interface SchemaEdge {
  readonly id: string
  readonly from: string
  readonly to: string
  /** Cardinality text, e.g. `1..1`, `0..n`, `3` */
  cardinality: string
  order?: number
}

// =============================================================================
// SNAPSHOT (wire format)
// =============================================================================

/**
 * Serialized node record: every node field, with connections as an array.
 */
export interface NodeRecord {
  id: string
  kind: NodeKind
  title: LocalizedText
  description: LocalizedText
  datatype: string
  constraints: ConstraintSet
  connections: string[]
  linkage?: ConceptLinkage
  xoneGroups?: string[][]
  datasetLinkage?: DatasetLinkage
}

export interface EdgeRecord {
  from: string
  to: string
  cardinality: string
  order?: number
}

/**
 * Persistable picture of a whole graph.
 */
export interface GraphSnapshot {
  nodes: Record<string, NodeRecord>
  edges: Record<string, EdgeRecord>
}

// =============================================================================
// READ-ONLY VIEW
// =============================================================================

/**
 * Read-only traversal surface consumed by compilers.
 * Implemented by the mutable graph and by snapshot views.
 */
export interface ShapeGraphView {
  /** The dataset node, if present */
  getDataset(): Readonly<DatasetNode> | undefined
  /** Look up a node by id */
  findNode(id: string): Readonly<SchemaNode> | undefined
  /** Edge between two nodes, in either direction */
  findEdge(a: string, b: string): Readonly<SchemaEdge> | undefined
  /** All edges, in creation order */
  listEdges(): ReadonlyArray<Readonly<SchemaEdge>>
}
