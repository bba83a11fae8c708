/**
 * Schema Graph
 *
 * The mutable schema model owned by one session. Wraps a GraphStore and
 * keeps its two invariants: connections are symmetric and mirrored by
 * exactly one edge, and there is exactly one dataset node.
 */

import {
  DEFAULT_CARDINALITY,
  InvalidStateError,
  MalformedInputError,
  NotFoundError,
  ValidationError,
  createEdge,
  createLogger,
  createNode,
  createTurtleCompiler,
  defaultIdGenerator,
  hasText,
  mergeConstraintFacts,
  nodeToRecord,
  recordToNode,
} from "shapegraph"
import type {
  CompiledShapes,
  CompilerOptions,
  ConceptRecord,
  ConstraintFacts,
  ConstraintInput,
  ConstraintSet,
  DatasetNode,
  EdgeUpdate,
  GraphSnapshot,
  IdGenerator,
  LocalizedText,
  Logger,
  NodeKind,
  NodeUpdate,
  SchemaEdge,
  SchemaNode,
  ShapeGraphView,
} from "shapegraph"
import { GraphStore, type StoreStats } from "./store"

/**
 * Configuration for a schema graph.
 */
export interface SchemaGraphConfig {
  /** Custom ID generator (defaults to `<kind>_<uuid>`) */
  idGenerator?: IdGenerator
  logger?: Logger
}

const DATASET_TITLE = "Dataset"
const DATASET_DESCRIPTION = "Dataset description"

const COUNT_FIELDS = ["minCount", "maxCount", "minLength", "maxLength"] as const

/**
 * In-memory schema graph.
 *
 * @example
 * ```typescript
 * const graph = new SchemaGraph()
 * const dataset = graph.getDataset()
 * const name = graph.addNode('DataElement', { de: 'Name', en: 'Name' })
 * graph.connect(dataset.id, name, '0..1')
 * const { turtle } = graph.compile({ schemaVersion: '1.0.0' })
 * ```
 */
export class SchemaGraph implements ShapeGraphView {
  private readonly store = new GraphStore()
  private readonly idGenerator: IdGenerator
  private readonly logger: Logger

  constructor(config: SchemaGraphConfig = {}) {
    this.idGenerator = config.idGenerator ?? defaultIdGenerator
    this.logger = config.logger ?? createLogger({ component: "SchemaGraph" })
    this.reset()
  }

  // ===========================================================================
  // NODES
  // ===========================================================================

  /**
   * Create an unconnected node.
   *
   * @throws InvalidStateError when adding a second dataset
   */
  addNode(kind: NodeKind, title: LocalizedText, description: LocalizedText = ""): string {
    if (kind === "Dataset" && this.store.countByKind("Dataset") > 0) {
      throw new InvalidStateError("A graph holds exactly one dataset", "DuplicateDataset")
    }

    const id = this.idGenerator.generate(kind)
    this.store.createNode(createNode(kind, id, { title, description }))
    this.logger.debug({ id, kind }, "Node added")
    return id
  }

  /**
   * @throws NotFoundError if the node doesn't exist
   */
  getNode(id: string): Readonly<SchemaNode> {
    const node = this.store.getNode(id)
    if (!node) throw new NotFoundError("node", id)
    return node
  }

  findNode(id: string): Readonly<SchemaNode> | undefined {
    return this.store.getNode(id)
  }

  /**
   * All nodes, or the nodes of one kind, in creation order.
   */
  listNodes(kind?: NodeKind): Readonly<SchemaNode>[] {
    return kind === undefined ? this.store.getAllNodes() : this.store.getNodesByKind(kind)
  }

  getDataset(): Readonly<DatasetNode> {
    const dataset = this.store.getNodesByKind("Dataset")[0]
    if (dataset?.kind !== "Dataset") {
      throw new InvalidStateError("Graph has no dataset", "NoDataset")
    }
    return dataset
  }

  /**
   * Update a node's title, description or datatype.
   */
  updateNode(id: string, update: NodeUpdate): void {
    this.store.updateNode(id, (node) => {
      if (update.title !== undefined) node.title = update.title
      if (update.description !== undefined) node.description = update.description
      if (update.datatype !== undefined) node.datatype = update.datatype
    })
    this.logger.debug({ id }, "Node updated")
  }

  /**
   * Replace a node's constraint set. Numeric fields take numbers or numeric
   * text; anything else leaves the field unset.
   */
  updateConstraints(id: string, input: ConstraintInput): void {
    if (!this.store.hasNode(id)) throw new NotFoundError("node", id)

    const constraints: ConstraintSet = { inValues: input.inValues ?? [] }
    for (const field of COUNT_FIELDS) {
      const value = this.readInteger(id, field, input[field], 0)
      if (value !== undefined) constraints[field] = value
    }
    const order = this.readInteger(id, "order", input.order)
    if (order !== undefined) constraints.order = order

    const pattern = nonEmpty(input.pattern)
    if (pattern !== undefined) constraints.pattern = pattern
    const nodeReference = nonEmpty(input.nodeReference)
    if (nodeReference !== undefined) constraints.nodeReference = nodeReference
    const range = nonEmpty(input.range)
    if (range !== undefined) constraints.range = range

    this.store.updateNode(id, (node) => {
      node.constraints = constraints
    })
    this.logger.debug({ id }, "Constraints replaced")
  }

  /**
   * Delete a node, its connections and every edge referencing it.
   *
   * @throws NotFoundError if the node doesn't exist
   * @throws InvalidStateError when deleting the dataset
   */
  deleteNode(id: string): void {
    const node = this.getNode(id)
    if (node.kind === "Dataset") {
      throw new InvalidStateError("The sole dataset cannot be deleted", "SoleDataset")
    }

    this.store.transaction(() => {
      for (const other of node.connections) {
        if (this.store.hasNode(other)) {
          this.store.updateNode(other, (neighbour) => {
            neighbour.connections.delete(id)
          })
        }
      }
      this.dropFromXone(id)
      this.store.deleteNode(id)
    })
    this.logger.debug({ id, kind: node.kind }, "Node deleted")
  }

  /**
   * Clear the graph and create a fresh dataset.
   */
  reset(): void {
    this.store.clear()
    const id = this.idGenerator.generate("Dataset")
    this.store.createNode(
      createNode("Dataset", id, { title: DATASET_TITLE, description: DATASET_DESCRIPTION }),
    )
    this.logger.debug({ id }, "Graph reset")
  }

  // ===========================================================================
  // CONNECTIONS
  // ===========================================================================

  /**
   * Connect two nodes symmetrically. Reconnecting a connected pair in either
   * direction returns the existing edge unchanged.
   *
   * @returns the id of the edge mirroring the connection
   * @throws NotFoundError if either node doesn't exist
   */
  connect(a: string, b: string, cardinality: string = DEFAULT_CARDINALITY, order?: number): string {
    if (!this.store.hasNode(a)) throw new NotFoundError("node", a)
    if (!this.store.hasNode(b)) throw new NotFoundError("node", b)
    if (a === b) throw new ValidationError("A node cannot be connected to itself", "to", b)

    const existing = this.findEdge(a, b)
    if (existing) return existing.id

    const edge = createEdge(a, b, cardinality, order)
    this.store.transaction(() => {
      this.store.updateNode(a, (node) => {
        node.connections.add(b)
      })
      this.store.updateNode(b, (node) => {
        node.connections.add(a)
      })
      this.store.createEdge(edge)
    })
    this.logger.debug({ from: a, to: b, cardinality }, "Nodes connected")
    return edge.id
  }

  /**
   * Remove the connection between two nodes. Not connected is a no-op.
   */
  disconnect(a: string, b: string): void {
    this.store.transaction(() => {
      if (this.store.hasNode(a)) {
        this.store.updateNode(a, (node) => {
          node.connections.delete(b)
        })
      }
      if (this.store.hasNode(b)) {
        this.store.updateNode(b, (node) => {
          node.connections.delete(a)
        })
      }
      const edge = this.findEdge(a, b)
      if (edge) this.store.deleteEdge(edge.id)

      const dataset = this.getDataset()
      if (a === dataset.id) this.dropFromXone(b)
      if (b === dataset.id) this.dropFromXone(a)
    })
    this.logger.debug({ from: a, to: b }, "Nodes disconnected")
  }

  /**
   * @throws NotFoundError if the edge doesn't exist
   */
  getEdge(id: string): Readonly<SchemaEdge> {
    const edge = this.store.getEdge(id)
    if (!edge) throw new NotFoundError("edge", id)
    return edge
  }

  findEdge(a: string, b: string): Readonly<SchemaEdge> | undefined {
    return this.store.findEdge(a, b) ?? this.store.findEdge(b, a)
  }

  listEdges(): Readonly<SchemaEdge>[] {
    return this.store.getAllEdges()
  }

  /**
   * Change an edge's cardinality or order; a null order clears it.
   *
   * @throws NotFoundError if the edge doesn't exist
   */
  updateEdge(id: string, update: EdgeUpdate): void {
    this.store.updateEdge(id, update)
    this.logger.debug({ id }, "Edge updated")
  }

  /**
   * Delete an edge together with the connection it mirrors.
   *
   * @throws NotFoundError if the edge doesn't exist
   */
  deleteEdge(id: string): void {
    const edge = this.getEdge(id)
    this.disconnect(edge.from, edge.to)
  }

  // ===========================================================================
  // CATALOGUE LINKAGE
  // ===========================================================================

  /**
   * Link a concept or data element to a catalogue concept. The record's
   * title and description replace the node's when present, and the
   * constraint facts are merged over the node's constraints.
   *
   * @throws InvalidStateError if the node is not a concept or data element
   */
  linkConcept(id: string, record: ConceptRecord, facts: ConstraintFacts = {}): void {
    this.store.updateNode(id, (node) => {
      if (node.kind !== "Concept" && node.kind !== "DataElement") {
        throw new InvalidStateError(`Only concepts and data elements can be linked, got ${node.kind}`, "KindMismatch")
      }

      node.linkage = { linked: true, conceptId: record.id, conceptUri: record.uri, external: record.raw }
      if (hasText(record.title)) node.title = record.title
      if (hasText(record.description)) node.description = record.description

      const merged = mergeConstraintFacts(node.constraints, node.datatype, facts)
      node.constraints = merged.constraints
      node.datatype = merged.datatype
    })
    this.logger.debug({ id, conceptId: record.id }, "Concept linked")
  }

  /**
   * Clear a node's concept linkage. Text and constraints stay as they are.
   */
  unlinkConcept(id: string): void {
    this.store.updateNode(id, (node) => {
      if (node.kind !== "Concept" && node.kind !== "DataElement") {
        throw new InvalidStateError(`Only concepts and data elements can be unlinked, got ${node.kind}`, "KindMismatch")
      }
      node.linkage = { linked: false }
    })
    this.logger.debug({ id }, "Concept unlinked")
  }

  /**
   * Link the dataset to a catalogue dataset. The record's title and
   * description replace the dataset's when present.
   */
  linkDataset(record: ConceptRecord): void {
    const { id } = this.getDataset()
    this.store.updateNode(id, (node) => {
      if (node.kind !== "Dataset") return
      node.datasetLinkage = { linked: true, datasetId: record.id, datasetUri: record.uri, external: record.raw }
      if (hasText(record.title)) node.title = record.title
      if (hasText(record.description)) node.description = record.description
    })
    this.logger.debug({ id, datasetId: record.id }, "Dataset linked")
  }

  /**
   * Clear the dataset's catalogue link. Title and description stay.
   *
   * @throws InvalidStateError if the dataset is not linked
   */
  unlinkDataset(): void {
    const dataset = this.getDataset()
    if (!dataset.datasetLinkage.linked) {
      throw new InvalidStateError("Dataset is not linked to a catalogue dataset", "NotLinked")
    }
    this.store.updateNode(dataset.id, (node) => {
      if (node.kind === "Dataset") node.datasetLinkage = { linked: false }
    })
    this.logger.debug({ id: dataset.id }, "Dataset unlinked")
  }

  /**
   * Replace the dataset's exclusive groups. Ids not connected to the
   * dataset are dropped, and so are groups left empty.
   *
   * @returns the groups as stored
   */
  setXoneGroups(groups: readonly (readonly string[])[]): string[][] {
    const dataset = this.getDataset()
    const accepted = groups
      .map((group) => [...new Set(group)].filter((id) => dataset.connections.has(id)))
      .filter((group) => group.length > 0)

    this.store.updateNode(dataset.id, (node) => {
      if (node.kind === "Dataset") node.xoneGroups = accepted
    })
    return accepted.map((group) => [...group])
  }

  // ===========================================================================
  // SNAPSHOTS & EXPORT
  // ===========================================================================

  /**
   * Persistable picture of the graph.
   */
  toSnapshot(): GraphSnapshot {
    const data = this.store.export()
    const snapshot: GraphSnapshot = { nodes: {}, edges: {} }
    for (const node of data.nodes) {
      snapshot.nodes[node.id] = nodeToRecord(node)
    }
    for (const edge of data.edges) {
      const { id, ...record } = edge
      snapshot.edges[id] = record
    }
    return snapshot
  }

  /**
   * Rebuild a graph from a snapshot. Connections are made symmetric, a
   * connection without an edge gets one with the default cardinality, and
   * references to missing nodes are dropped.
   *
   * @throws InvalidStateError unless the snapshot holds exactly one dataset
   */
  static fromSnapshot(snapshot: GraphSnapshot, config: SchemaGraphConfig = {}): SchemaGraph {
    const records = Object.entries(snapshot.nodes).map(([id, record]) => ({ ...record, id }))
    const datasets = records.filter((record) => record.kind === "Dataset").length
    if (datasets === 0) {
      throw new InvalidStateError("Snapshot holds no dataset", "NoDataset")
    }
    if (datasets > 1) {
      throw new InvalidStateError(`Snapshot holds ${datasets} datasets`, "DuplicateDataset")
    }

    const graph = new SchemaGraph(config)
    const { store } = graph
    store.import({
      nodes: records.map((record) => {
        const node = recordToNode(record)
        node.connections.clear()
        return node
      }),
      edges: [],
    })

    for (const edge of Object.values(snapshot.edges)) {
      if (store.hasNode(edge.from) && store.hasNode(edge.to) && edge.from !== edge.to) {
        graph.connect(edge.from, edge.to, edge.cardinality, edge.order)
      }
    }
    for (const record of records) {
      for (const other of record.connections) {
        if (store.hasNode(other) && other !== record.id) graph.connect(record.id, other)
      }
    }

    const dataset = graph.getDataset()
    graph.setXoneGroups(dataset.xoneGroups)

    graph.logger.debug(graph.stats(), "Graph restored from snapshot")
    return graph
  }

  /**
   * Compile the graph into a SHACL shapes document.
   *
   * @example
   * ```typescript
   * const { turtle, warnings } = graph.compile({ baseUri: 'https://example.org' })
   * ```
   */
  compile(options: CompilerOptions = {}): CompiledShapes {
    return createTurtleCompiler(options, this.logger).compile(this)
  }

  stats(): StoreStats {
    return this.store.stats()
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private dropFromXone(id: string): void {
    const dataset = this.store.getNodesByKind("Dataset")[0]
    if (!dataset) return
    this.store.updateNode(dataset.id, (node) => {
      if (node.kind !== "Dataset") return
      node.xoneGroups = node.xoneGroups
        .map((group) => group.filter((member) => member !== id))
        .filter((group) => group.length > 0)
    })
  }

  /**
   * Permissive integer parse: empty is unset, malformed is unset and logged.
   */
  private readInteger(
    id: string,
    field: string,
    value: number | string | null | undefined,
    min = Number.MIN_SAFE_INTEGER,
  ): number | undefined {
    if (value === null || value === undefined) return undefined
    const text = typeof value === "number" ? String(value) : value.trim()
    if (text === "") return undefined

    const parsed = /^-?\d+$/.test(text) ? Number(text) : Number.NaN
    if (Number.isSafeInteger(parsed) && parsed >= min) return parsed

    const error = new MalformedInputError(field, value)
    this.logger.warn({ id, field, err: error }, "Malformed constraint value ignored")
    return undefined
  }
}

function nonEmpty(value: string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined
  const trimmed = value.trim()
  return trimmed === "" ? undefined : trimmed
}

/**
 * Create a schema graph holding one fresh dataset.
 */
export function createSchemaGraph(config: SchemaGraphConfig = {}): SchemaGraph {
  return new SchemaGraph(config)
}
