/**
 * Graph Snapshot
 *
 * Wire format used to persist and exchange a graph, its zod schema, and
 * conversions between node objects and their records.
 */

import { z } from "zod"
import { ValidationError } from "../errors"
import { DEFAULT_CARDINALITY, DEFAULT_DATATYPE, createNode, edgeId } from "./builders"
import {
  NODE_KINDS,
  type DatasetNode,
  type GraphSnapshot,
  type NodeRecord,
  type SchemaEdge,
  type SchemaNode,
  type ShapeGraphView,
} from "./types"

// =============================================================================
// SCHEMAS
// =============================================================================

export const localizedTextSchema = z.union([
  z.string(),
  z.object({
    de: z.string().optional(),
    en: z.string().optional(),
    fr: z.string().optional(),
    it: z.string().optional(),
    rm: z.string().optional(),
  }),
])

const count = z.number().int().nonnegative()

export const constraintSetSchema = z.object({
  minCount: count.optional(),
  maxCount: count.optional(),
  minLength: count.optional(),
  maxLength: count.optional(),
  pattern: z.string().optional(),
  inValues: z.array(z.string()).default([]),
  nodeReference: z.string().optional(),
  range: z.string().optional(),
  order: z.number().int().optional(),
})

export const linkageSchema = z.object({
  linked: z.boolean(),
  conceptId: z.string().optional(),
  conceptUri: z.string().optional(),
  external: z.unknown().optional(),
})

export const datasetLinkageSchema = z.object({
  linked: z.boolean(),
  datasetId: z.string().optional(),
  datasetUri: z.string().optional(),
  external: z.unknown().optional(),
})

export const nodeRecordSchema = z.object({
  id: z.string().min(1),
  kind: z.enum(NODE_KINDS),
  title: localizedTextSchema.default(""),
  description: localizedTextSchema.default(""),
  datatype: z.string().default(DEFAULT_DATATYPE),
  constraints: constraintSetSchema.default({}),
  connections: z.array(z.string()).default([]),
  linkage: linkageSchema.optional(),
  xoneGroups: z.array(z.array(z.string())).optional(),
  datasetLinkage: datasetLinkageSchema.optional(),
})

export const edgeRecordSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  cardinality: z.string().default(DEFAULT_CARDINALITY),
  order: z.number().int().optional(),
})

export const graphSnapshotSchema = z.object({
  nodes: z.record(z.string(), nodeRecordSchema),
  edges: z.record(z.string(), edgeRecordSchema).default({}),
})

/**
 * Validate an untrusted snapshot.
 * @throws ValidationError naming the first offending path
 */
export function parseSnapshot(input: unknown): GraphSnapshot {
  const result = graphSnapshotSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.errors[0]
    const field = issue?.path.join(".")
    throw new ValidationError(
      `Invalid snapshot${field ? ` at ${field}` : ""}: ${issue?.message ?? "validation failed"}`,
      field,
    )
  }
  return result.data
}

// =============================================================================
// CONVERSIONS
// =============================================================================

/**
 * Serialize a node, connections in insertion order.
 */
export function nodeToRecord(node: Readonly<SchemaNode>): NodeRecord {
  const record: NodeRecord = {
    id: node.id,
    kind: node.kind,
    title: structuredClone(node.title),
    description: structuredClone(node.description),
    datatype: node.datatype,
    constraints: structuredClone(node.constraints),
    connections: [...node.connections],
  }

  switch (node.kind) {
    case "Dataset":
      record.xoneGroups = node.xoneGroups.map((group) => [...group])
      record.datasetLinkage = structuredClone(node.datasetLinkage)
      break
    case "Concept":
    case "DataElement":
      record.linkage = structuredClone(node.linkage)
      break
    case "Class":
      break
  }

  return record
}

/**
 * Rebuild a node from its record. The record's id is authoritative.
 */
export function recordToNode(record: NodeRecord): SchemaNode {
  const init = {
    title: structuredClone(record.title),
    description: structuredClone(record.description),
    datatype: record.datatype,
    constraints: structuredClone(record.constraints),
  }

  const node = createNode(record.kind, record.id, init)
  for (const id of record.connections) node.connections.add(id)

  switch (node.kind) {
    case "Dataset":
      node.xoneGroups = (record.xoneGroups ?? []).map((group) => [...group])
      if (record.datasetLinkage) node.datasetLinkage = structuredClone(record.datasetLinkage)
      break
    case "Concept":
    case "DataElement":
      if (record.linkage) node.linkage = structuredClone(record.linkage)
      break
    case "Class":
      break
  }

  return node
}

// =============================================================================
// VIEW
// =============================================================================

/**
 * Read-only view over a snapshot, for compiling without a live graph.
 * Connections are taken as recorded; edge lookup accepts either direction.
 */
export function createSnapshotView(snapshot: GraphSnapshot): ShapeGraphView {
  const nodes = new Map<string, SchemaNode>()
  for (const [id, record] of Object.entries(snapshot.nodes)) {
    nodes.set(id, recordToNode({ ...record, id }))
  }

  const edges = new Map<string, SchemaEdge>()
  for (const record of Object.values(snapshot.edges)) {
    const id = edgeId(record.from, record.to)
    edges.set(id, { id, ...record })
  }

  const dataset = [...nodes.values()].find(
    (node): node is DatasetNode => node.kind === "Dataset",
  )

  return {
    getDataset: () => dataset,
    findNode: (id) => nodes.get(id),
    findEdge: (a, b) => edges.get(edgeId(a, b)) ?? edges.get(edgeId(b, a)),
    listEdges: () => [...edges.values()],
  }
}
