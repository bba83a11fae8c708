/**
 * Turtle Shapes Compiler
 *
 * Walks a schema graph from its dataset and emits a SHACL shapes document:
 * one NodeShape for the dataset, one per class, and a PropertyShape for every
 * concept, data element and class reference.
 */

import { DataFactory } from "n3"
import type { BlankNode, NamedNode } from "n3"
import { parseCardinality, hasBounds } from "../../cardinality/codec"
import { InvalidStateError } from "../../errors"
import { createLogger, type Logger } from "../../logger"
import type {
  ClassNode,
  DatasetNode,
  LocalizedText,
  PropertyNode,
  SchemaEdge,
  SchemaNode,
  ShapeGraphView,
} from "../../schema/types"
import { resolveText } from "../../schema/text"
import { LiteralTracker, uniqueLanguageValues } from "../../text/multilingual"
import { normalizeDatasetId, normalizeSegment, structureNamespace, UriAllocator } from "../../text/naming"
import type { ShapeCompilerFactory, ShapeCompilerProvider } from "../provider"
import type { CompiledShapes, CompilerOptions } from "../types"
import { resolveDatatype, terms } from "../vocabulary"
import { documentPrefixes, finalizeTurtle } from "./prefixes"
import { N3TripleSink, type TripleObject, type TripleSink, type TripleSubject } from "./sink"

const { namedNode, literal, blankNode } = DataFactory

const DEFAULTS = {
  baseUri: "https://www.i14y.admin.ch",
  datasetIdCase: "lower",
  schemaVersion: "1.0.0",
} as const

/** Scheme, then no whitespace or characters Turtle forbids inside `<>` */
const ABSOLUTE_IRI = /^[A-Za-z][A-Za-z0-9+.-]*:[^\s<>"{}|\\^`]*$/

const TITLE_PREDICATES = [terms.title, terms.label]
const NAMED_TITLE_PREDICATES = [terms.title, terms.label, terms.name]
const DESCRIPTION_PREDICATES = [terms.description, terms.comment]
const PROPERTY_DESCRIPTION_PREDICATES = [terms.description, terms.comment, terms.shDescription]

/**
 * A child of a shape, with its connecting edge and sort position.
 */
interface Child<N extends SchemaNode = SchemaNode> {
  node: Readonly<N>
  edge: Readonly<SchemaEdge> | undefined
  order: number
}

interface Counts {
  min?: number
  max?: number
}

/**
 * Turtle compiler implementation.
 */
export class TurtleCompiler implements ShapeCompilerProvider {
  readonly name = "turtle"

  private options: CompilerOptions
  private readonly logger: Logger

  private sink: TripleSink = new N3TripleSink()
  private tracker = new LiteralTracker()
  private allocator = new UriAllocator("")
  private listCounter = 0
  private classShapes = new Map<string, { iri: string; segment: string }>()
  private datasetProperties = new Map<string, string>()
  private counts = { nodeShapes: 0, propertyShapes: 0, lists: 0 }

  constructor(options: CompilerOptions = {}, logger?: Logger) {
    this.options = options
    this.logger = logger ?? createLogger({ component: "TurtleCompiler" })
  }

  compile(graph: ShapeGraphView, options?: CompilerOptions): CompiledShapes {
    // Allow options override per compile call
    const opts = options ? { ...this.options, ...options } : this.options

    const dataset = graph.getDataset()
    if (!dataset) {
      throw new InvalidStateError("Cannot compile a graph without a dataset", "NoDataset")
    }

    const datasetId = normalizeDatasetId(
      resolveText(dataset.title),
      opts.datasetIdCase ?? DEFAULTS.datasetIdCase,
    )
    const namespace = structureNamespace(opts.baseUri ?? DEFAULTS.baseUri, datasetId)
    const prefixes = Object.fromEntries(documentPrefixes(namespace, opts.extraPrefixes))

    // Reset state
    this.sink = new N3TripleSink(prefixes)
    this.tracker = new LiteralTracker()
    this.allocator = new UriAllocator(namespace)
    this.listCounter = 0
    this.classShapes = new Map()
    this.datasetProperties = new Map()
    this.counts = { nodeShapes: 0, propertyShapes: 0, lists: 0 }

    const datasetUri = namedNode(this.allocator.reserve(datasetId))
    this.emitDataset(datasetUri, dataset, opts)

    const children = this.orderedChildren(graph, dataset)
    const classes = children.filter((child): child is Child<ClassNode> => child.node.kind === "Class")

    // Class IRIs first, so class-to-class references can point at them
    for (const { node } of classes) {
      const segment = normalizeSegment(resolveText(node.title))
      this.classShapes.set(node.id, this.allocator.allocate(segment, "", "Type"))
    }

    for (const child of children) {
      if (child.node.kind === "Class") {
        this.emitClassReference(datasetUri, datasetId, child.node, child)
      } else if (child.node.kind === "Concept" || child.node.kind === "DataElement") {
        const iri = this.emitPropertyShape(datasetUri, `${datasetId}/`, child.node, child)
        this.datasetProperties.set(child.node.id, iri.value)
      }
    }

    for (const { node } of classes) {
      this.emitClassShape(graph, node)
    }

    this.emitXone(datasetUri, dataset)

    const warnings = [...this.tracker.warnings]
    for (const warning of warnings) {
      this.logger.warn(warning, "Duplicate literal with different content suppressed")
    }

    const turtle = finalizeTurtle(this.sink.serialize(), namespace, opts.extraPrefixes)

    this.logger.debug(
      { datasetId, triples: this.sink.size, ...this.counts },
      "Compiled shapes document",
    )

    return {
      turtle,
      datasetId,
      namespace,
      warnings,
      meta: { triples: this.sink.size, ...this.counts },
    }
  }

  // ---------------------------------------------------------------------------
  // SHAPES
  // ---------------------------------------------------------------------------

  private emitDataset(subject: NamedNode, dataset: Readonly<DatasetNode>, opts: CompilerOptions): void {
    this.counts.nodeShapes++
    this.addType(subject, terms.NodeShape, terms.Class, terms.DataStructureDefinition)

    const version = opts.schemaVersion ?? DEFAULTS.schemaVersion
    this.sink.add(subject, namedNode(terms.pavVersion), literal(version))
    this.sink.add(subject, namedNode(terms.schemaVersion), literal(version))

    const now = opts.now ? opts.now() : new Date()
    this.sink.add(
      subject,
      namedNode(terms.validFrom),
      literal(localDate(now), namedNode(terms.date)),
    )

    this.emitText(subject, dataset.title, TITLE_PREDICATES)
    this.emitText(subject, dataset.description, DESCRIPTION_PREDICATES)
  }

  private emitClassShape(graph: ShapeGraphView, node: Readonly<ClassNode>): void {
    const shape = this.classShapes.get(node.id)
    if (!shape) return

    const subject = namedNode(shape.iri)
    this.counts.nodeShapes++
    this.addType(subject, terms.Class, terms.NodeShape)
    this.sink.add(subject, namedNode(terms.closed), literal("true", namedNode(terms.boolean)))
    this.emitText(subject, node.title, NAMED_TITLE_PREDICATES)
    this.emitText(subject, node.description, DESCRIPTION_PREDICATES)

    for (const child of this.orderedChildren(graph, node)) {
      const target = child.node
      if (target.kind === "Concept" || target.kind === "DataElement") {
        this.emitPropertyShape(subject, `${shape.segment}/`, target, child)
      } else if (target.kind === "Class") {
        // Only the edge's source side owns the reference
        if (child.edge?.from !== node.id) continue
        const targetShape = this.classShapes.get(target.id)
        if (!targetShape) continue
        this.emitClassToClass(subject, shape.segment, targetShape, target, child)
      }
    }
  }

  /**
   * PropertyShape for a concept or data element.
   */
  private emitPropertyShape(
    owner: NamedNode,
    pathPrefix: string,
    node: Readonly<PropertyNode>,
    child: Child,
  ): NamedNode {
    const segment = normalizeSegment(resolveText(node.title))
    const subject = namedNode(this.allocator.allocate(segment, pathPrefix).iri)
    const { constraints } = node

    this.counts.propertyShapes++
    this.addType(subject, terms.PropertyShape, terms.DatatypeProperty, terms.AttributeProperty)
    this.sink.add(subject, namedNode(terms.path), subject)
    this.sink.add(subject, namedNode(terms.datatype), namedNode(resolveDatatype(node.datatype)))

    const fallbackMin = constraints.minCount ?? (node.kind === "DataElement" ? 1 : undefined)
    this.emitCounts(subject, this.resolveCounts(child.edge, fallbackMin, constraints.maxCount))

    if (constraints.minLength !== undefined) {
      this.sink.add(subject, namedNode(terms.minLength), integer(constraints.minLength))
    }
    if (constraints.maxLength !== undefined) {
      this.sink.add(subject, namedNode(terms.maxLength), integer(constraints.maxLength))
    }
    if (constraints.pattern) {
      this.sink.add(subject, namedNode(terms.pattern), literal(constraints.pattern))
    }
    if (constraints.range) {
      this.sink.add(subject, namedNode(terms.range), namedNode(resolveDatatype(constraints.range)))
    }
    if (constraints.nodeReference) {
      const target = this.classShapes.get(constraints.nodeReference)?.iri ?? constraints.nodeReference
      if (ABSOLUTE_IRI.test(target)) {
        this.sink.add(subject, namedNode(terms.node), namedNode(target))
      } else {
        this.logger.warn({ subject: subject.value, nodeReference: target }, "Node reference is neither a class nor an IRI, skipped")
      }
    }
    this.sink.add(subject, namedNode(terms.order), integer(child.order))

    if (node.linkage.linked && node.linkage.conceptUri) {
      this.sink.add(subject, namedNode(terms.conformsTo), namedNode(node.linkage.conceptUri))
    }

    this.emitText(subject, node.title, NAMED_TITLE_PREDICATES)
    this.emitText(subject, node.description, PROPERTY_DESCRIPTION_PREDICATES)

    if (constraints.inValues.length > 0) {
      this.addType(subject, terms.CodedProperty)
      const head = this.emitList(constraints.inValues.map((value) => literal(value)))
      this.sink.add(subject, namedNode(terms.in), head)
    }

    this.sink.add(owner, namedNode(terms.property), subject)
    return subject
  }

  /**
   * Dataset-level PropertyShape pointing at a class shape.
   */
  private emitClassReference(
    owner: NamedNode,
    datasetId: string,
    node: Readonly<ClassNode>,
    child: Child,
  ): void {
    const shape = this.classShapes.get(node.id)
    if (!shape) return

    const subject = namedNode(this.allocator.allocate(shape.segment, `${datasetId}/`).iri)
    this.counts.propertyShapes++
    this.addType(subject, terms.PropertyShape, terms.ObjectProperty)
    this.sink.add(subject, namedNode(terms.path), subject)
    this.sink.add(subject, namedNode(terms.node), namedNode(shape.iri))
    this.emitCounts(
      subject,
      this.resolveCounts(child.edge, node.constraints.minCount, node.constraints.maxCount),
    )
    this.sink.add(subject, namedNode(terms.order), integer(child.order))
    this.emitText(subject, node.title, NAMED_TITLE_PREDICATES)
    this.emitText(subject, node.description, PROPERTY_DESCRIPTION_PREDICATES)
    this.sink.add(owner, namedNode(terms.property), subject)
  }

  private emitClassToClass(
    owner: NamedNode,
    fromSegment: string,
    target: { iri: string; segment: string },
    node: Readonly<ClassNode>,
    child: Child,
  ): void {
    const subject = namedNode(this.allocator.allocate(`${fromSegment}_has_${target.segment}`).iri)
    const title = resolveText(node.title)

    this.counts.propertyShapes++
    this.addType(subject, terms.PropertyShape, terms.ObjectProperty)
    this.sink.add(subject, namedNode(terms.path), subject)
    this.sink.add(subject, namedNode(terms.node), namedNode(target.iri))
    this.emitCounts(subject, this.resolveCounts(child.edge, undefined, undefined))
    this.sink.add(subject, namedNode(terms.order), integer(child.order))
    this.emitText(subject, `has ${title}`, NAMED_TITLE_PREDICATES)
    this.emitText(subject, `Reference to ${title} instances`, PROPERTY_DESCRIPTION_PREDICATES)
    this.sink.add(owner, namedNode(terms.property), subject)
  }

  private emitXone(subject: NamedNode, dataset: Readonly<DatasetNode>): void {
    for (const group of dataset.xoneGroups) {
      const members = group.flatMap((id) => {
        const iri = this.datasetProperties.get(id)
        return iri === undefined ? [] : [namedNode(iri)]
      })
      if (members.length === 0) continue
      this.sink.add(subject, namedNode(terms.xone), this.emitList(members))
    }
  }

  // ---------------------------------------------------------------------------
  // HELPERS
  // ---------------------------------------------------------------------------

  /**
   * Connected nodes of a shape, sorted by explicit order (edge first, then
   * node); ties and unordered nodes keep connection order, unordered last.
   * Nodes of kind Dataset are never children.
   */
  private orderedChildren(graph: ShapeGraphView, owner: Readonly<SchemaNode>): Child[] {
    const entries: Array<{ node: Readonly<SchemaNode>; edge: Readonly<SchemaEdge> | undefined; explicit?: number }> = []

    for (const id of owner.connections) {
      const node = graph.findNode(id)
      if (!node || node.kind === "Dataset") continue
      const edge = graph.findEdge(owner.id, id)
      entries.push({ node, edge, explicit: edge?.order ?? node.constraints.order })
    }

    const sorted = entries
      .map((entry, index) => ({ entry, index }))
      .sort((a, b) => {
        const left = a.entry.explicit ?? Number.POSITIVE_INFINITY
        const right = b.entry.explicit ?? Number.POSITIVE_INFINITY
        return left === right ? a.index - b.index : left - right
      })

    return sorted.map(({ entry }, position) => ({
      node: entry.node,
      edge: entry.edge,
      order: entry.explicit ?? position,
    }))
  }

  /**
   * Edge cardinality wins; without one, the node's own counts apply.
   */
  private resolveCounts(
    edge: Readonly<SchemaEdge> | undefined,
    fallbackMin: number | undefined,
    fallbackMax: number | undefined,
  ): Counts {
    const bounds = parseCardinality(edge?.cardinality)
    if (hasBounds(bounds)) {
      return { min: bounds.min ?? fallbackMin, max: bounds.max }
    }
    return { min: fallbackMin, max: fallbackMax }
  }

  private emitCounts(subject: NamedNode, counts: Counts): void {
    if (counts.min !== undefined) {
      this.sink.add(subject, namedNode(terms.minCount), integer(counts.min))
    }
    if (counts.max !== undefined) {
      this.sink.add(subject, namedNode(terms.maxCount), integer(counts.max))
    }
  }

  /**
   * Build an RDF list. Blank node ids are unique across the document.
   */
  private emitList(items: TripleObject[]): NamedNode | BlankNode {
    if (items.length === 0) return namedNode(terms.nil)
    this.counts.lists++

    const cells = items.map(() => blankNode(`autos${this.listCounter++}`))
    items.forEach((item, index) => {
      const cell = cells[index]
      if (!cell) return
      this.sink.add(cell, namedNode(terms.first), item)
      this.sink.add(cell, namedNode(terms.rest), cells[index + 1] ?? namedNode(terms.nil))
    })

    return cells[0] ?? namedNode(terms.nil)
  }

  private emitText(subject: NamedNode, text: LocalizedText, predicates: readonly string[]): void {
    for (const { lang, text: value } of uniqueLanguageValues(text)) {
      for (const predicate of predicates) {
        if (this.tracker.claim(subject.value, predicate, lang, value)) {
          this.sink.add(subject, namedNode(predicate), literal(value, lang))
        }
      }
    }
  }

  private addType(subject: TripleSubject, ...types: string[]): void {
    for (const type of types) {
      this.sink.add(subject, namedNode(terms.type), namedNode(type))
    }
  }
}

/**
 * `YYYY-MM-DD` in the local time zone.
 */
function localDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0")
  const day = String(date.getDate()).padStart(2, "0")
  return `${date.getFullYear()}-${month}-${day}`
}

function integer(value: number) {
  return literal(String(value), namedNode(terms.integer))
}

/**
 * Create a Turtle compiler.
 *
 * @example
 * ```typescript
 * const { turtle } = createTurtleCompiler({ schemaVersion: '2.0.0' }).compile(graph)
 * ```
 */
export const createTurtleCompiler: ShapeCompilerFactory = (options, logger) =>
  new TurtleCompiler(options, logger)
