/**
 * Schema Module
 *
 * The graph model: node and edge types, builders, the snapshot wire format,
 * and the boundary messages that mutate a graph.
 */

export { LANGUAGES, NODE_KINDS } from "./types"
export type {
  Language,
  LocalizedText,
  NodeKind,
  PropertyKind,
  ConstraintSet,
  ConceptLinkage,
  DatasetLinkage,
  DatasetNode,
  ClassNode,
  ConceptNode,
  DataElementNode,
  SchemaNode,
  PropertyNode,
  NodeOfKind,
  SchemaEdge,
  NodeRecord,
  EdgeRecord,
  GraphSnapshot,
  ShapeGraphView,
} from "./types"

export {
  DEFAULT_DATATYPE,
  DEFAULT_CARDINALITY,
  emptyConstraints,
  emptyLinkage,
  createNode,
  createEdge,
  edgeId,
  isPropertyNode,
  defaultIdGenerator,
} from "./builders"
export type { NodeInit, IdGenerator } from "./builders"

export { DISPLAY_FALLBACK, resolveText, hasText } from "./text"

export {
  localizedTextSchema,
  constraintSetSchema,
  linkageSchema,
  datasetLinkageSchema,
  nodeRecordSchema,
  edgeRecordSchema,
  graphSnapshotSchema,
  parseSnapshot,
  nodeToRecord,
  recordToNode,
  createSnapshotView,
} from "./snapshot"

export {
  constraintInputSchema,
  nodeUpdateSchema,
  edgeUpdateSchema,
  commandSchema,
  parseCommand,
} from "./messages"
export type { ConstraintInput, NodeUpdate, EdgeUpdate, Command, CommandType } from "./messages"
