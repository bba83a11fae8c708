/**
 * Turtle Compiler Specification Tests
 *
 * Every document is parsed back with n3 and checked triple by triple:
 * - dataset, class and property shapes
 * - cardinality resolution and defaults
 * - multilingual deduplication
 * - RDF lists for enumerations and exclusive groups
 * - the fixed prefix block
 */

import { describe, it, expect } from "vitest"
import { createTurtleCompiler, terms } from "../../src/compiler"
import { InvalidStateError } from "../../src/errors"
import { silentLogger } from "../../src/logger"
import { createSnapshotView } from "../../src/schema"
import type { CompilerOptions } from "../../src/compiler"
import type { GraphSnapshot } from "../../src/schema"
import {
  BASE_URI,
  FIXED_NOW,
  buildSnapshot,
  listOf,
  objectsOf,
  parseTurtle,
  subjectsOfType,
  valuesOf,
  type EdgeSpec,
  type NodeSpec,
} from "./fixtures/graphs"

const NS = `${BASE_URI}/resources/datasets/tiere/structure/`
const DATASET = `${NS}tiere`

function compile(snapshot: GraphSnapshot, options: CompilerOptions = {}) {
  const compiler = createTurtleCompiler({ baseUri: BASE_URI, now: FIXED_NOW, ...options }, silentLogger())
  return compiler.compile(createSnapshotView(snapshot))
}

function compileTiere(nodes: NodeSpec[], edges: EdgeSpec[] = [], options: CompilerOptions = {}) {
  const dataset: NodeSpec = { id: "ds", kind: "Dataset", title: "Tiere", description: "Alle Tiere" }
  const result = compile(buildSnapshot([dataset, ...nodes], edges), options)
  return { ...result, store: parseTurtle(result.turtle) }
}

function literalsOf(store: ReturnType<typeof parseTurtle>, subject: string, predicate: string) {
  return objectsOf(store, subject, predicate).map((term) =>
    term.termType === "Literal" ? { value: term.value, lang: term.language } : { value: term.value, lang: "" },
  )
}

describe("Turtle Compiler", () => {
  // ===========================================================================
  // DOCUMENT
  // ===========================================================================

  describe("document", () => {
    it("starts with the fixed prefix block", () => {
      const { turtle } = compileTiere([])

      const header = [
        "@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#>.",
        "@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#>.",
        "@prefix xsd: <http://www.w3.org/2001/XMLSchema#>.",
        "@prefix xml: <http://www.w3.org/XML/1998/namespace>.",
        "@prefix QB: <http://purl.org/linked-data/cube#>.",
        "@prefix dcterms: <http://purl.org/dc/terms/>.",
        `@prefix i14y: <${NS}>.`,
        "@prefix owl: <http://www.w3.org/2002/07/owl#>.",
        "@prefix pav: <http://purl.org/pav/>.",
        "@prefix schema: <https://schema.org/>.",
        "@prefix sh: <http://www.w3.org/ns/shacl#>.",
      ].join("\n")

      expect(turtle.startsWith(`${header}\n\n`)).toBe(true)
      expect(turtle.match(/@prefix/g)).toHaveLength(11)
    })

    it("declares extra prefixes once, after the fixed block", () => {
      const { turtle } = compileTiere([], [], {
        extraPrefixes: { ex: "https://example.org/ex#", sh: "https://example.org/other#" },
      })

      const prefixLines = turtle.split("\n").filter((line) => line.startsWith("@prefix"))
      expect(prefixLines).toHaveLength(12)
      expect(prefixLines[10]).toBe("@prefix sh: <http://www.w3.org/ns/shacl#>.")
      expect(prefixLines[11]).toBe("@prefix ex: <https://example.org/ex#>.")
    })

    it("is byte-stable across compiles", () => {
      const nodes: NodeSpec[] = [{ id: "a", kind: "DataElement", title: "Name", constraints: { inValues: ["x", "y"] } }]
      const edges: EdgeSpec[] = [["ds", "a"]]

      expect(compileTiere(nodes, edges).turtle).toBe(compileTiere(nodes, edges).turtle)
    })

    it("rejects a graph without a dataset", () => {
      const snapshot = buildSnapshot([{ id: "a", kind: "Concept", title: "Name" }])
      expect(() => compile(snapshot)).toThrow(InvalidStateError)
    })
  })

  // ===========================================================================
  // DATASET
  // ===========================================================================

  describe("dataset shape", () => {
    it("emits exactly one node shape and no properties for a bare dataset", () => {
      const { store, datasetId, namespace, meta } = compileTiere([])

      expect(datasetId).toBe("tiere")
      expect(namespace).toBe(NS)
      expect(subjectsOfType(store, terms.NodeShape)).toEqual([DATASET])
      expect(store.countQuads(null, terms.property, null, null)).toBe(0)
      expect(meta).toMatchObject({ nodeShapes: 1, propertyShapes: 0, lists: 0 })
    })

    it("types the dataset and stamps version and validity", () => {
      const { store } = compileTiere([], [], { schemaVersion: "2.0.0" })

      expect(valuesOf(store, DATASET, terms.type).sort()).toEqual(
        [terms.Class, terms.DataStructureDefinition, terms.NodeShape].sort(),
      )
      expect(valuesOf(store, DATASET, terms.pavVersion)).toEqual(["2.0.0"])
      expect(valuesOf(store, DATASET, terms.schemaVersion)).toEqual(["2.0.0"])

      const [validFrom] = objectsOf(store, DATASET, terms.validFrom)
      expect(validFrom?.value).toBe("2024-03-01")
      expect(validFrom?.termType === "Literal" ? validFrom.datatype.value : undefined).toBe(terms.date)
    })

    it("dates validity by the local calendar day", () => {
      const lateEvening = () => new Date(2024, 0, 31, 23, 30)
      const { store } = compileTiere([], [], { now: lateEvening })

      expect(valuesOf(store, DATASET, terms.validFrom)).toEqual(["2024-01-31"])
    })

    it("binds title and description to their predicates", () => {
      const { store } = compileTiere([])

      expect(literalsOf(store, DATASET, terms.title)).toEqual([{ value: "Tiere", lang: "de" }])
      expect(literalsOf(store, DATASET, terms.label)).toEqual([{ value: "Tiere", lang: "de" }])
      expect(literalsOf(store, DATASET, terms.description)).toEqual([{ value: "Alle Tiere", lang: "de" }])
      expect(literalsOf(store, DATASET, terms.comment)).toEqual([{ value: "Alle Tiere", lang: "de" }])
    })

    it("keeps identical content under one language", () => {
      const snapshot = buildSnapshot([{ id: "ds", kind: "Dataset", title: { de: "Hund", en: "Hund" } }])
      const result = compile(snapshot)
      const store = parseTurtle(result.turtle)
      const subject = `${BASE_URI}/resources/datasets/hund/structure/hund`

      expect(literalsOf(store, subject, terms.title)).toEqual([{ value: "Hund", lang: "de" }])
    })

    it("uppercases the dataset id on request", () => {
      const snapshot = buildSnapshot([{ id: "ds", kind: "Dataset", title: "Tiere" }])
      expect(compile(snapshot, { datasetIdCase: "upper" }).datasetId).toBe("TIERE")
    })
  })

  // ===========================================================================
  // PROPERTY SHAPES
  // ===========================================================================

  describe("property shapes", () => {
    it("emits a typed property shape attached to the dataset", () => {
      const { store } = compileTiere(
        [{ id: "a", kind: "Concept", title: { de: "Name", fr: "Nom" }, datatype: "xsd:date" }],
        [["ds", "a", "0..1"]],
      )
      const shape = `${NS}tiere/Name`

      expect(valuesOf(store, DATASET, terms.property)).toEqual([shape])
      expect(valuesOf(store, shape, terms.type).sort()).toEqual(
        [terms.AttributeProperty, terms.DatatypeProperty, terms.PropertyShape].sort(),
      )
      expect(valuesOf(store, shape, terms.path)).toEqual([shape])
      expect(valuesOf(store, shape, terms.datatype)).toEqual([`${terms.date}`])
      expect(valuesOf(store, shape, terms.minCount)).toEqual(["0"])
      expect(valuesOf(store, shape, terms.maxCount)).toEqual(["1"])
      expect(valuesOf(store, shape, terms.order)).toEqual(["0"])
      expect(literalsOf(store, shape, terms.name).map(({ value, lang }) => `${value}@${lang}`).sort()).toEqual([
        "Name@de",
        "Nom@fr",
      ])
    })

    it("defaults minCount to 1 for a data element without edge cardinality", () => {
      const { store } = compileTiere(
        [
          { id: "a", kind: "DataElement", title: "Name" },
          { id: "b", kind: "Concept", title: "Alter" },
        ],
        [
          ["ds", "a", ""],
          ["ds", "b", ""],
        ],
      )

      expect(valuesOf(store, `${NS}tiere/Name`, terms.minCount)).toEqual(["1"])
      expect(valuesOf(store, `${NS}tiere/Name`, terms.maxCount)).toEqual([])
      expect(valuesOf(store, `${NS}tiere/Alter`, terms.minCount)).toEqual([])
    })

    it("prefers edge cardinality over the node's counts", () => {
      const { store } = compileTiere(
        [
          { id: "a", kind: "DataElement", title: "Edge", constraints: { minCount: 5, maxCount: 9 } },
          { id: "b", kind: "DataElement", title: "Node", constraints: { minCount: 2, maxCount: 3 } },
        ],
        [
          ["ds", "a", "0..n"],
          ["ds", "b", "garbage"],
        ],
      )

      expect(valuesOf(store, `${NS}tiere/Edge`, terms.minCount)).toEqual(["0"])
      expect(valuesOf(store, `${NS}tiere/Edge`, terms.maxCount)).toEqual([])
      expect(valuesOf(store, `${NS}tiere/Node`, terms.minCount)).toEqual(["2"])
      expect(valuesOf(store, `${NS}tiere/Node`, terms.maxCount)).toEqual(["3"])
    })

    it("emits the optional constraints that are set", () => {
      const { store } = compileTiere(
        [
          {
            id: "a",
            kind: "DataElement",
            title: "PLZ",
            constraints: { minLength: 4, maxLength: 4, pattern: "^[0-9]{4}$", range: "xsd:integer" },
          },
        ],
        [["ds", "a"]],
      )
      const shape = `${NS}tiere/PLZ`

      expect(valuesOf(store, shape, terms.minLength)).toEqual(["4"])
      expect(valuesOf(store, shape, terms.maxLength)).toEqual(["4"])
      expect(valuesOf(store, shape, terms.pattern)).toEqual(["^[0-9]{4}$"])
      expect(valuesOf(store, shape, terms.range)).toEqual([`${terms.integer}`])
      expect(valuesOf(store, shape, terms.node)).toEqual([])
    })

    it("emits conformsTo once for a linked concept", () => {
      const conceptUri = "https://concepts.test/c-9/description"
      const { store, turtle } = compileTiere(
        [{ id: "a", kind: "Concept", title: "Geschlecht", linkage: { linked: true, conceptId: "c-9", conceptUri } }],
        [["ds", "a"]],
      )

      expect(valuesOf(store, `${NS}tiere/Geschlecht`, terms.conformsTo)).toEqual([conceptUri])
      expect(turtle.split(conceptUri)).toHaveLength(2)
    })

    it("orders children by explicit order, unordered last", () => {
      const { store } = compileTiere(
        [
          { id: "a", kind: "DataElement", title: "Erstes" },
          { id: "b", kind: "DataElement", title: "Zweites" },
          { id: "c", kind: "DataElement", title: "Drittes", constraints: { order: 7 } },
        ],
        [
          ["ds", "a"],
          ["ds", "b", "1..1", 0],
          ["ds", "c"],
        ],
      )

      expect(valuesOf(store, `${NS}tiere/Zweites`, terms.order)).toEqual(["0"])
      expect(valuesOf(store, `${NS}tiere/Drittes`, terms.order)).toEqual(["7"])
      expect(valuesOf(store, `${NS}tiere/Erstes`, terms.order)).toEqual(["2"])
    })

    it("keeps siblings with the same title apart", () => {
      const { store } = compileTiere(
        [
          { id: "a", kind: "DataElement", title: "Name" },
          { id: "b", kind: "DataElement", title: "Name" },
        ],
        [
          ["ds", "a"],
          ["ds", "b"],
        ],
      )

      expect(valuesOf(store, DATASET, terms.property).sort()).toEqual([`${NS}tiere/Name`, `${NS}tiere/Name_2`])
    })
  })

  // ===========================================================================
  // ENUMERATIONS & LISTS
  // ===========================================================================

  describe("enumerations", () => {
    it("round-trips enumeration values in order", () => {
      const values = ["rot", "grün", "blau", "Grau Blau"]
      const { store } = compileTiere(
        [{ id: "a", kind: "Concept", title: "Farbe", constraints: { inValues: values } }],
        [["ds", "a"]],
      )
      const shape = `${NS}tiere/Farbe`

      expect(listOf(store, shape, terms.in)).toEqual(values)
      expect(valuesOf(store, shape, terms.type)).toContain(terms.CodedProperty)
    })

    it("numbers blank nodes across the whole document", () => {
      const { turtle, meta } = compileTiere(
        [
          { id: "a", kind: "Concept", title: "Farbe", constraints: { inValues: ["rot", "blau"] } },
          { id: "b", kind: "Concept", title: "Form", constraints: { inValues: ["rund", "eckig", "flach"] } },
        ],
        [
          ["ds", "a"],
          ["ds", "b"],
        ],
      )

      expect(meta.lists).toBe(2)
      expect(turtle).toContain("_:autos4")
      expect(turtle).not.toContain("_:autos5")
    })

    it("emits exclusive groups as lists of property shapes", () => {
      const { store } = compileTiere(
        [
          { id: "a", kind: "DataElement", title: "AHV" },
          { id: "b", kind: "DataElement", title: "Pass" },
          { id: "c", kind: "DataElement", title: "Name" },
        ],
        [
          ["ds", "a"],
          ["ds", "b"],
          ["ds", "c"],
        ],
      )

      expect(store.countQuads(null, terms.xone, null, null)).toBe(0)

      const grouped = compile(
        buildSnapshot(
          [
            { id: "ds", kind: "Dataset", title: "Tiere", xoneGroups: [["a", "b", "missing"]] },
            { id: "a", kind: "DataElement", title: "AHV" },
            { id: "b", kind: "DataElement", title: "Pass" },
          ],
          [
            ["ds", "a"],
            ["ds", "b"],
          ],
        ),
      )
      expect(listOf(parseTurtle(grouped.turtle), DATASET, terms.xone)).toEqual([`${NS}tiere/AHV`, `${NS}tiere/Pass`])
    })
  })

  // ===========================================================================
  // CLASSES
  // ===========================================================================

  describe("classes", () => {
    const nodes: NodeSpec[] = [
      { id: "p", kind: "Class", title: "Person", description: "Eine Person" },
      { id: "adr", kind: "Class", title: "Adresse" },
      { id: "str", kind: "DataElement", title: "Strasse" },
      { id: "vn", kind: "Concept", title: "Vorname" },
    ]
    const edges: EdgeSpec[] = [
      ["ds", "p", "1..n"],
      ["ds", "adr", "0..1"],
      ["adr", "str", "1..1"],
      ["p", "vn", "0..1"],
      ["p", "adr", "0..n"],
    ]

    it("emits a closed node shape per class", () => {
      const { store, meta } = compileTiere(nodes, edges)
      const person = `${NS}PersonType`

      expect(subjectsOfType(store, terms.NodeShape).sort()).toEqual([`${NS}AdresseType`, person, DATASET].sort())
      expect(valuesOf(store, person, terms.closed)).toEqual(["true"])
      expect(literalsOf(store, person, terms.name)).toEqual([{ value: "Person", lang: "de" }])
      expect(literalsOf(store, person, terms.comment)).toEqual([{ value: "Eine Person", lang: "de" }])
      expect(meta.nodeShapes).toBe(3)
    })

    it("references each class from the dataset", () => {
      const { store } = compileTiere(nodes, edges)
      const reference = `${NS}tiere/Adresse`

      expect(valuesOf(store, DATASET, terms.property).sort()).toEqual([reference, `${NS}tiere/Person`])
      expect(valuesOf(store, reference, terms.type)).toContain(terms.ObjectProperty)
      expect(valuesOf(store, reference, terms.node)).toEqual([`${NS}AdresseType`])
      expect(valuesOf(store, reference, terms.minCount)).toEqual(["0"])
      expect(valuesOf(store, reference, terms.maxCount)).toEqual(["1"])
    })

    it("nests property shapes under the class", () => {
      const { store } = compileTiere(nodes, edges)

      expect(valuesOf(store, `${NS}AdresseType`, terms.property)).toEqual([`${NS}Adresse/Strasse`])
      expect(valuesOf(store, `${NS}Adresse/Strasse`, terms.minCount)).toEqual(["1"])
    })

    it("links a class to another class from the edge's source side", () => {
      const { store } = compileTiere(nodes, edges)
      const reference = `${NS}Person_has_Adresse`

      expect(valuesOf(store, `${NS}PersonType`, terms.property).sort()).toEqual([`${NS}Person/Vorname`, reference])
      expect(valuesOf(store, reference, terms.node)).toEqual([`${NS}AdresseType`])
      expect(valuesOf(store, reference, terms.minCount)).toEqual(["0"])
      expect(literalsOf(store, reference, terms.title)).toEqual([{ value: "has Adresse", lang: "de" }])
      expect(valuesOf(store, `${NS}AdresseType`, terms.property)).not.toContain(`${NS}Adresse_has_Person`)
    })

    it("points sh:node at a referenced class shape", () => {
      const { store } = compileTiere(
        [
          { id: "k", kind: "Class", title: "Kontakt" },
          { id: "a", kind: "DataElement", title: "Kontaktdaten", constraints: { nodeReference: "k" } },
        ],
        [
          ["ds", "k"],
          ["ds", "a"],
        ],
      )

      expect(valuesOf(store, `${NS}tiere/Kontaktdaten`, terms.node)).toEqual([`${NS}KontaktType`])
    })

    it("keeps an absolute IRI reference and skips anything else", () => {
      const { store } = compileTiere(
        [
          { id: "a", kind: "DataElement", title: "Extern", constraints: { nodeReference: "https://shapes.test/Address" } },
          { id: "b", kind: "DataElement", title: "Kaputt", constraints: { nodeReference: "foo bar" } },
        ],
        [
          ["ds", "a"],
          ["ds", "b"],
        ],
      )

      expect(valuesOf(store, `${NS}tiere/Extern`, terms.node)).toEqual(["https://shapes.test/Address"])
      expect(valuesOf(store, `${NS}tiere/Kaputt`, terms.node)).toEqual([])
      expect(valuesOf(store, `${NS}tiere/Kaputt`, terms.order)).toHaveLength(1)
    })
  })
})
