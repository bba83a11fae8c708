/**
 * Turtle Importer
 *
 * Reads a shapes document back into a graph snapshot. Node shapes that
 * are the target of an `sh:node` become classes; the remaining node shape is
 * the dataset. Datatype property shapes become concepts (when they conform
 * to a concept) or data elements.
 */

import { DataFactory, Parser, Store } from "n3"
import type { Quad_Object } from "n3"
import { formatCardinality } from "../cardinality/codec"
import { ValidationError } from "../errors"
import { DEFAULT_DATATYPE, defaultIdGenerator, edgeId, emptyConstraints, type IdGenerator } from "../schema/builders"
import {
  LANGUAGES,
  type EdgeRecord,
  type GraphSnapshot,
  type Language,
  type LocalizedText,
  type NodeKind,
  type NodeRecord,
} from "../schema/types"
import { XSD, terms } from "../compiler/vocabulary"

const { namedNode } = DataFactory

export interface ImportOptions {
  /** Id generator for imported nodes */
  idGenerator?: IdGenerator
}

const TITLE_PREDICATES = [terms.title, terms.label, terms.name]
const DESCRIPTION_PREDICATES = [terms.description, terms.comment, terms.shDescription]
const CONCEPT_ID = /\/([^/]+)\/description\/?$/

/**
 * Parse a shapes document into a snapshot.
 *
 * @throws ValidationError if the text is not Turtle or holds no dataset shape
 */
export function importTurtle(text: string, options: ImportOptions = {}): GraphSnapshot {
  let store: Store
  try {
    store = new Store(new Parser().parse(text))
  } catch (error) {
    throw new ValidationError(
      `Invalid Turtle: ${error instanceof Error ? error.message : String(error)}`,
      "turtle",
    )
  }
  return new ShapesReader(store, options.idGenerator ?? defaultIdGenerator).read()
}

class ShapesReader {
  private readonly nodes: Record<string, NodeRecord> = {}
  private readonly edges: Record<string, EdgeRecord> = {}
  /** Node id per shape IRI */
  private readonly ids = new Map<string, string>()

  constructor(
    private readonly store: Store,
    private readonly idGenerator: IdGenerator,
  ) {}

  read(): GraphSnapshot {
    const nodeShapes = this.subjectsOfType(terms.NodeShape)
    const referenced = new Set(this.store.getObjects(null, namedNode(terms.node), null).map((term) => term.value))

    const datasetIri =
      nodeShapes.find((iri) => !referenced.has(iri) && this.hasType(iri, terms.DataStructureDefinition)) ??
      nodeShapes.find((iri) => !referenced.has(iri))
    if (datasetIri === undefined) {
      throw new ValidationError("Turtle document holds no dataset shape", "turtle")
    }

    const datasetId = this.addNode(datasetIri, "Dataset")
    const classIris = nodeShapes.filter((iri) => iri !== datasetIri && referenced.has(iri))
    for (const iri of classIris) this.addNode(iri, "Class")

    for (const owner of [datasetIri, ...classIris]) {
      this.readProperties(owner)
    }

    // Classes nothing points at still belong to the dataset
    for (const iri of classIris) {
      const id = this.idOf(iri)
      const node = this.nodes[id]
      if (node && node.connections.length === 0) this.connect(datasetId, id, "")
    }

    this.readXone(datasetIri)

    return { nodes: this.nodes, edges: this.edges }
  }

  private readProperties(ownerIri: string): void {
    const ownerId = this.idOf(ownerIri)

    for (const property of this.store.getObjects(namedNode(ownerIri), namedNode(terms.property), null)) {
      if (property.termType !== "NamedNode") continue
      const iri = property.value
      const cardinality = formatCardinality(
        this.integer(iri, terms.minCount),
        this.integer(iri, terms.maxCount),
      )
      const order = this.integer(iri, terms.order)

      if (this.hasType(iri, terms.ObjectProperty)) {
        const target = this.iri(iri, terms.node)
        const targetId = target === undefined ? undefined : this.ids.get(target)
        if (targetId !== undefined && targetId !== ownerId) {
          this.connect(ownerId, targetId, cardinality, order)
        }
        continue
      }

      const propertyId = this.addProperty(iri)
      this.connect(ownerId, propertyId, cardinality, order)
    }
  }

  private addProperty(iri: string): string {
    const existing = this.ids.get(iri)
    if (existing !== undefined) return existing

    const conformsTo = this.iri(iri, terms.conformsTo)
    const id = this.addNode(iri, conformsTo === undefined ? "DataElement" : "Concept")
    const record = this.nodes[id]
    if (!record) return id

    const constraints = emptyConstraints()
    const minLength = this.integer(iri, terms.minLength)
    if (minLength !== undefined) constraints.minLength = minLength
    const maxLength = this.integer(iri, terms.maxLength)
    if (maxLength !== undefined) constraints.maxLength = maxLength
    const pattern = this.literal(iri, terms.pattern)
    if (pattern !== undefined) constraints.pattern = pattern
    const range = this.iri(iri, terms.range)
    if (range !== undefined) constraints.range = shortenXsd(range)
    const nodeReference = this.iri(iri, terms.node)
    if (nodeReference !== undefined) constraints.nodeReference = nodeReference

    const list = this.store.getObjects(namedNode(iri), namedNode(terms.in), null)[0]
    if (list) constraints.inValues = this.readList(list).map((term) => term.value)

    record.constraints = constraints
    record.datatype = shortenXsd(this.iri(iri, terms.datatype) ?? DEFAULT_DATATYPE)

    if (conformsTo !== undefined) {
      const conceptId = CONCEPT_ID.exec(conformsTo)?.[1]
      record.linkage = conceptId === undefined
        ? { linked: true, conceptUri: conformsTo }
        : { linked: true, conceptUri: conformsTo, conceptId }
    } else {
      record.linkage = { linked: false }
    }

    return id
  }

  private readXone(datasetIri: string): void {
    const dataset = this.nodes[this.idOf(datasetIri)]
    if (!dataset) return

    const groups: string[][] = []
    for (const head of this.store.getObjects(namedNode(datasetIri), namedNode(terms.xone), null)) {
      const ids = this.readList(head).flatMap((term) => {
        const id = this.ids.get(term.value)
        return id === undefined ? [] : [id]
      })
      if (ids.length > 0) groups.push(ids)
    }
    dataset.xoneGroups = groups
  }

  // ---------------------------------------------------------------------------
  // GRAPH BUILDING
  // ---------------------------------------------------------------------------

  private addNode(iri: string, kind: NodeKind): string {
    const id = this.idGenerator.generate(kind)
    this.ids.set(iri, id)
    this.nodes[id] = {
      id,
      kind,
      title: this.text(iri, TITLE_PREDICATES),
      description: this.text(iri, DESCRIPTION_PREDICATES),
      datatype: DEFAULT_DATATYPE,
      constraints: emptyConstraints(),
      connections: [],
      ...(kind === "Dataset" ? { xoneGroups: [], datasetLinkage: { linked: false } } : {}),
      ...(kind === "Concept" || kind === "DataElement" ? { linkage: { linked: false } } : {}),
    }
    return id
  }

  private connect(from: string, to: string, cardinality: string, order?: number): void {
    const source = this.nodes[from]
    const target = this.nodes[to]
    if (!source || !target) return
    if (this.edges[edgeId(from, to)] || this.edges[edgeId(to, from)]) return

    if (!source.connections.includes(to)) source.connections.push(to)
    if (!target.connections.includes(from)) target.connections.push(from)
    this.edges[edgeId(from, to)] = order === undefined ? { from, to, cardinality } : { from, to, cardinality, order }
  }

  private idOf(iri: string): string {
    const id = this.ids.get(iri)
    if (id === undefined) throw new ValidationError(`Shape was not read: ${iri}`, "turtle")
    return id
  }

  // ---------------------------------------------------------------------------
  // STORE ACCESS
  // ---------------------------------------------------------------------------

  private subjectsOfType(type: string): string[] {
    return this.store
      .getSubjects(namedNode(terms.type), namedNode(type), null)
      .filter((term) => term.termType === "NamedNode")
      .map((term) => term.value)
  }

  private hasType(iri: string, type: string): boolean {
    return this.store.countQuads(namedNode(iri), namedNode(terms.type), namedNode(type), null) > 0
  }

  private objects(iri: string, predicate: string): Quad_Object[] {
    return this.store.getObjects(namedNode(iri), namedNode(predicate), null)
  }

  private iri(iri: string, predicate: string): string | undefined {
    return this.objects(iri, predicate).find((term) => term.termType === "NamedNode")?.value
  }

  private literal(iri: string, predicate: string): string | undefined {
    return this.objects(iri, predicate).find((term) => term.termType === "Literal")?.value
  }

  private integer(iri: string, predicate: string): number | undefined {
    const value = this.literal(iri, predicate)
    if (value === undefined) return undefined
    const parsed = Number(value)
    return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined
  }

  /**
   * Title or description across predicates; first literal per language wins.
   * Untagged literals count as German.
   */
  private text(iri: string, predicates: readonly string[]): LocalizedText {
    const text: Partial<Record<Language, string>> = {}
    for (const predicate of predicates) {
      for (const term of this.objects(iri, predicate)) {
        if (term.termType !== "Literal") continue
        const lang = toLanguage(term.language || "de")
        if (lang !== undefined && text[lang] === undefined) text[lang] = term.value
      }
    }
    return text
  }

  private readList(head: Quad_Object): Quad_Object[] {
    const items: Quad_Object[] = []
    const visited = new Set<string>()
    let cell: Quad_Object = head

    while (cell.termType !== "NamedNode" || cell.value !== terms.nil) {
      if (cell.termType !== "NamedNode" && cell.termType !== "BlankNode") break
      const key = `${cell.termType}:${cell.value}`
      if (visited.has(key)) break
      visited.add(key)

      const first = this.store.getObjects(cell, namedNode(terms.first), null)[0]
      if (first) items.push(first)
      const rest = this.store.getObjects(cell, namedNode(terms.rest), null)[0]
      if (!rest) break
      cell = rest
    }

    return items
  }
}

function toLanguage(tag: string): Language | undefined {
  const base = tag.toLowerCase().split("-")[0]
  return LANGUAGES.find((lang) => lang === base)
}

function shortenXsd(iri: string): string {
  return iri.startsWith(XSD) ? `xsd:${iri.slice(XSD.length)}` : iri
}
