/**
 * shapegraph - Schema Graphs Compiled to SHACL
 *
 * Model a dataset, its classes, concepts and data elements as a property
 * graph and compile it into a deterministic SHACL shapes document in Turtle.
 *
 * @example
 * ```typescript
 * import { createTurtleCompiler, createSnapshotView } from 'shapegraph';
 *
 * const view = createSnapshotView(snapshot);
 * const { turtle, warnings } = createTurtleCompiler({ schemaVersion: '1.0.0' }).compile(view);
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// SCHEMA
// =============================================================================

export {
  LANGUAGES,
  NODE_KINDS,
  DEFAULT_DATATYPE,
  DEFAULT_CARDINALITY,
  emptyConstraints,
  emptyLinkage,
  createNode,
  createEdge,
  edgeId,
  isPropertyNode,
  defaultIdGenerator,
  DISPLAY_FALLBACK,
  resolveText,
  hasText,
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
  constraintInputSchema,
  nodeUpdateSchema,
  edgeUpdateSchema,
  commandSchema,
  parseCommand,
} from "./schema"
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
  NodeInit,
  IdGenerator,
  ConstraintInput,
  NodeUpdate,
  EdgeUpdate,
  Command,
  CommandType,
} from "./schema"

// =============================================================================
// CODECS & TEXT
// =============================================================================

export { parseCardinality, formatCardinality, hasBounds } from "./cardinality"
export type { CardinalityBounds } from "./cardinality"

export {
  EMITTED_LANGUAGES,
  collapseWhitespace,
  sanitizeLiteral,
  toLanguageMap,
  uniqueLanguageValues,
  LiteralTracker,
  normalizeDatasetId,
  normalizeSegment,
  structureNamespace,
  UriAllocator,
} from "./text"
export type {
  EmittedLanguage,
  LanguageValue,
  DuplicateContentWarning,
  IdCase,
  AllocatedUri,
} from "./text"

// =============================================================================
// COMPILER
// =============================================================================

export {
  TurtleCompiler,
  createTurtleCompiler,
  N3TripleSink,
  documentPrefixes,
  renderPrefixBlock,
  finalizeTurtle,
  FIXED_PREFIX_ORDER,
  fixedPrefixes,
  resolveDatatype,
  terms,
  ns,
} from "./compiler"
export type {
  ShapeCompilerProvider,
  ShapeCompilerFactory,
  TripleSink,
  TripleSubject,
  TripleObject,
  CompiledShapes,
  CompilerOptions,
} from "./compiler"

// =============================================================================
// IMPORTER
// =============================================================================

export { importTurtle } from "./importer"
export type { ImportOptions } from "./importer"

// =============================================================================
// CONSTRAINTS & LOOKUP
// =============================================================================

export {
  RecordConstraintSource,
  RemoteConstraintSource,
  mapDatatypeHint,
  codelistValue,
  codelistValues,
  mergeConstraintFacts,
} from "./constraints"
export type { ConstraintFacts, ConstraintSource, MergedConstraints } from "./constraints"

export { I14yLookupClient, lookupOptionsFromConfig, toLocalizedText } from "./lookup"
export type { ConceptLookup, LookupClientOptions, ConceptRecord, CodelistEntry } from "./lookup"

// =============================================================================
// CONFIG & LOGGING
// =============================================================================

export { configSchema, loadConfig, defaultConfig } from "./config"
export type { ShapeGraphConfig, ShapeGraphConfigInput } from "./config"

export { createLogger, silentLogger } from "./logger"
export type { Logger, LogLevel, LoggerOptions } from "./logger"

// =============================================================================
// ERRORS
// =============================================================================

export {
  ShapeGraphError,
  NotFoundError,
  InvalidStateError,
  MalformedInputError,
  CollaboratorError,
  ValidationError,
  toErrorPayload,
} from "./errors"
export type { ShapeGraphErrorCode, InvalidStateReason, ErrorPayload } from "./errors"
