import { describe, it, expect, beforeEach } from "vitest"
import {
  InvalidStateError,
  NotFoundError,
  ValidationError,
  createLogger,
  silentLogger,
  type ConceptRecord,
  type IdGenerator,
} from "shapegraph"
import { SchemaGraph, type SchemaGraphConfig } from "../src"

// =============================================================================
// HELPERS
// =============================================================================

function sequentialIds(): IdGenerator {
  let next = 0
  return { generate: (kind) => `${kind.toLowerCase()}${++next}` }
}

function config(): SchemaGraphConfig {
  return { idGenerator: sequentialIds(), logger: silentLogger() }
}

function invalidState(fn: () => unknown): InvalidStateError {
  try {
    fn()
  } catch (error) {
    if (error instanceof InvalidStateError) return error
    throw error
  }
  throw new Error("Expected an InvalidStateError")
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

const RECORD: ConceptRecord = {
  id: "k-1",
  uri: "https://concepts.test/k-1/description",
  title: { de: "Land", en: "Country" },
  description: "",
  raw: { source: "test" },
}

// =============================================================================
// TESTS
// =============================================================================

describe("SchemaGraph", () => {
  let graph: SchemaGraph

  beforeEach(() => {
    graph = new SchemaGraph(config())
  })

  describe("dataset", () => {
    it("should start with one placeholder dataset", () => {
      const dataset = graph.getDataset()

      expect(dataset.id).toBe("dataset1")
      expect(dataset.title).toBe("Dataset")
      expect(dataset.description).toBe("Dataset description")
      expect(graph.stats().nodes).toBe(1)
    })

    it("should refuse a second dataset", () => {
      expect(invalidState(() => graph.addNode("Dataset", "Zweites")).reason).toBe("DuplicateDataset")
    })

    it("should refuse to delete the dataset", () => {
      expect(invalidState(() => graph.deleteNode("dataset1")).reason).toBe("SoleDataset")
    })

    it("should reset to a fresh dataset", () => {
      const concept = graph.addNode("Concept", "Farbe")
      graph.connect("dataset1", concept)

      graph.reset()

      expect(graph.stats()).toEqual({
        nodes: 1,
        edges: 0,
        byKind: { Dataset: 1, Class: 0, Concept: 0, DataElement: 0 },
      })
      expect(graph.getDataset().id).toBe("dataset3")
    })
  })

  describe("nodes", () => {
    it("should add unconnected nodes with generated ids", () => {
      const id = graph.addNode("Concept", { de: "Farbe", en: "Colour" }, "Eine Farbe")
      const node = graph.getNode(id)

      expect(id).toBe("concept2")
      expect(node.kind).toBe("Concept")
      expect(node.title).toEqual({ de: "Farbe", en: "Colour" })
      expect(node.description).toBe("Eine Farbe")
      expect(node.connections.size).toBe(0)
    })

    it("should distinguish getNode from findNode", () => {
      expect(() => graph.getNode("missing")).toThrow(NotFoundError)
      expect(graph.findNode("missing")).toBeUndefined()
    })

    it("should list nodes by kind in creation order", () => {
      graph.addNode("Class", "Person")
      graph.addNode("DataElement", "PLZ")
      graph.addNode("Class", "Adresse")

      expect(graph.listNodes("Class").map((node) => node.title)).toEqual(["Person", "Adresse"])
      expect(graph.listNodes()).toHaveLength(4)
    })

    it("should update only the given fields", () => {
      const id = graph.addNode("DataElement", "PLZ", "Postleitzahl")

      graph.updateNode(id, { datatype: "xsd:integer" })

      expect(graph.getNode(id)).toMatchObject({ title: "PLZ", description: "Postleitzahl", datatype: "xsd:integer" })
    })
  })

  describe("updateConstraints()", () => {
    it("should replace the constraint set", () => {
      const id = graph.addNode("DataElement", "PLZ")
      graph.updateConstraints(id, { pattern: "old", maxLength: 9 })

      graph.updateConstraints(id, {
        minCount: "2",
        order: "-3",
        pattern: "  ",
        range: " xsd:date ",
        inValues: ["a"],
      })

      expect(graph.getNode(id).constraints).toEqual({ inValues: ["a"], minCount: 2, order: -3, range: "xsd:date" })
    })

    it("should leave malformed numbers unset and log them", () => {
      const lines: Record<string, unknown>[] = []
      const logger = createLogger(
        { component: "test", level: "warn" },
        {
          write(chunk: string) {
            const entry: unknown = JSON.parse(chunk)
            if (isRecord(entry)) lines.push(entry)
          },
        },
      )
      const logged = new SchemaGraph({ idGenerator: sequentialIds(), logger })
      const id = logged.addNode("DataElement", "PLZ")

      logged.updateConstraints(id, { minCount: 1, maxCount: "abc", minLength: -1, maxLength: "1.5" })

      expect(logged.getNode(id).constraints).toEqual({ inValues: [], minCount: 1 })
      expect(lines.map((line) => line.field)).toEqual(["maxCount", "minLength", "maxLength"])
      expect(lines[0]?.msg).toBe("Malformed constraint value ignored")
      expect(lines[0]?.err).toMatchObject({ type: "MalformedInputError", message: 'Malformed value for maxCount: "abc"' })
    })

    it("should fail for a missing node", () => {
      expect(() => graph.updateConstraints("missing", {})).toThrow(NotFoundError)
    })
  })

  describe("connections", () => {
    let concept: string

    beforeEach(() => {
      concept = graph.addNode("Concept", "Farbe")
    })

    it("should connect symmetrically through one edge", () => {
      const edgeId = graph.connect("dataset1", concept, "0..1")

      expect(edgeId).toBe("dataset1-concept2")
      expect(graph.getNode("dataset1").connections).toEqual(new Set([concept]))
      expect(graph.getNode(concept).connections).toEqual(new Set(["dataset1"]))
      expect(graph.listEdges()).toEqual([{ id: edgeId, from: "dataset1", to: concept, cardinality: "0..1" }])
    })

    it("should return the existing edge when reconnecting either way", () => {
      const first = graph.connect("dataset1", concept, "0..1")
      const second = graph.connect(concept, "dataset1", "1..n")

      expect(second).toBe(first)
      expect(graph.getEdge(first).cardinality).toBe("0..1")
      expect(graph.listEdges()).toHaveLength(1)
    })

    it("should reject unknown nodes and self connections", () => {
      expect(() => graph.connect("dataset1", "missing")).toThrow("Node not found: 'missing'")
      expect(() => graph.connect(concept, concept)).toThrow(ValidationError)
    })

    it("should disconnect from either end", () => {
      graph.connect("dataset1", concept)

      graph.disconnect(concept, "dataset1")

      expect(graph.getNode("dataset1").connections.size).toBe(0)
      expect(graph.getNode(concept).connections.size).toBe(0)
      expect(graph.findEdge("dataset1", concept)).toBeUndefined()
    })

    it("should keep pairs apart when ids contain hyphens", () => {
      const ids = ["ds", "x-y", "z", "x", "y-z"]
      const hyphenated = new SchemaGraph({ idGenerator: { generate: () => ids.shift() ?? "extra" }, logger: silentLogger() })
      for (const title of ["A", "B", "C", "D"]) hyphenated.addNode("Class", title)

      const first = hyphenated.connect("x-y", "z")
      const second = hyphenated.connect("x", "y-z")

      expect(first).toBe("x~1y-z")
      expect(second).toBe("x-y~1z")
      expect(hyphenated.listEdges().map((edge) => [edge.from, edge.to])).toEqual([
        ["x-y", "z"],
        ["x", "y-z"],
      ])

      hyphenated.disconnect("x-y", "y-z")
      expect(hyphenated.stats().edges).toBe(2)

      hyphenated.disconnect("z", "x-y")
      expect(hyphenated.listEdges()).toEqual([{ id: "x-y~1z", from: "x", to: "y-z", cardinality: "1..1" }])
    })

    it("should take the new cardinality after disconnect and reconnect", () => {
      graph.connect("dataset1", concept, "0..1")
      graph.disconnect("dataset1", concept)

      const edgeId = graph.connect(concept, "dataset1", "1..n", 2)

      expect(graph.getEdge(edgeId)).toEqual({ id: "concept2-dataset1", from: concept, to: "dataset1", cardinality: "1..n", order: 2 })
    })

    it("should update an edge and clear its order", () => {
      const edgeId = graph.connect("dataset1", concept, "0..1", 5)

      graph.updateEdge(edgeId, { cardinality: "2..4", order: null })

      expect(graph.getEdge(edgeId)).toEqual({ id: edgeId, from: "dataset1", to: concept, cardinality: "2..4" })
    })

    it("should delete an edge together with its connection", () => {
      const edgeId = graph.connect("dataset1", concept)

      graph.deleteEdge(edgeId)

      expect(graph.getNode(concept).connections.size).toBe(0)
      expect(() => graph.getEdge(edgeId)).toThrow("Edge not found: 'dataset1-concept2'")
    })

    it("should cascade a node delete to neighbours and edges", () => {
      const person = graph.addNode("Class", "Person")
      graph.connect("dataset1", concept)
      graph.connect(person, concept)

      graph.deleteNode(concept)

      expect(graph.findNode(concept)).toBeUndefined()
      expect(graph.getNode("dataset1").connections.size).toBe(0)
      expect(graph.getNode(person).connections.size).toBe(0)
      expect(graph.listEdges()).toEqual([])
    })
  })

  describe("concept linkage", () => {
    it("should link a concept and merge its facts", () => {
      const id = graph.addNode("Concept", "Staat", "Bleibt")

      graph.linkConcept(id, RECORD, { datatype: "xsd:date", inValues: ["CH"] })

      expect(graph.getNode(id)).toMatchObject({
        title: { de: "Land", en: "Country" },
        description: "Bleibt",
        datatype: "xsd:date",
        constraints: { inValues: ["CH"] },
        linkage: {
          linked: true,
          conceptId: "k-1",
          conceptUri: "https://concepts.test/k-1/description",
          external: { source: "test" },
        },
      })
    })

    it("should unlink and keep the text", () => {
      const id = graph.addNode("DataElement", "Staat")
      graph.linkConcept(id, RECORD)

      graph.unlinkConcept(id)

      expect(graph.getNode(id)).toMatchObject({ title: { de: "Land", en: "Country" }, linkage: { linked: false } })
    })

    it("should only link concepts and data elements", () => {
      const id = graph.addNode("Class", "Person")
      expect(invalidState(() => graph.linkConcept(id, RECORD)).reason).toBe("KindMismatch")
    })
  })

  describe("dataset linkage", () => {
    const DATASET: ConceptRecord = {
      id: "d-4",
      uri: "https://datasets.test/d-4/description",
      title: { de: "Register", fr: "Registre" },
      description: "",
      raw: { source: "test" },
    }

    it("should link the dataset and adopt the catalogue title", () => {
      graph.linkDataset(DATASET)

      expect(graph.getDataset()).toMatchObject({
        id: "dataset1",
        title: { de: "Register", fr: "Registre" },
        description: "Dataset description",
        datasetLinkage: {
          linked: true,
          datasetId: "d-4",
          datasetUri: "https://datasets.test/d-4/description",
          external: { source: "test" },
        },
      })
    })

    it("should unlink and keep the text", () => {
      graph.linkDataset(DATASET)

      graph.unlinkDataset()

      expect(graph.getDataset().datasetLinkage).toEqual({ linked: false })
      expect(graph.getDataset().title).toEqual({ de: "Register", fr: "Registre" })
    })

    it("should refuse to unlink a dataset that is not linked", () => {
      expect(invalidState(() => graph.unlinkDataset()).reason).toBe("NotLinked")
    })

    it("should survive a snapshot", () => {
      graph.linkDataset(DATASET)

      const restored = SchemaGraph.fromSnapshot(graph.toSnapshot(), config())

      expect(restored.getDataset().datasetLinkage).toMatchObject({ linked: true, datasetId: "d-4" })
    })
  })

  describe("exclusive groups", () => {
    let a: string
    let b: string
    let c: string

    beforeEach(() => {
      a = graph.addNode("DataElement", "AHV")
      b = graph.addNode("DataElement", "Pass")
      c = graph.addNode("DataElement", "Frei")
      graph.connect("dataset1", a)
      graph.connect("dataset1", b)
    })

    it("should keep only dataset properties, once each", () => {
      const groups = graph.setXoneGroups([[a, b, a], [c]])

      expect(groups).toEqual([[a, b]])
      expect(graph.getDataset().xoneGroups).toEqual([[a, b]])
    })

    it("should drop a member when it leaves the dataset", () => {
      graph.setXoneGroups([[a, b]])

      graph.disconnect("dataset1", b)
      expect(graph.getDataset().xoneGroups).toEqual([[a]])

      graph.deleteNode(a)
      expect(graph.getDataset().xoneGroups).toEqual([])
    })
  })

  describe("snapshots", () => {
    it("should restore what it saved", () => {
      const person = graph.addNode("Class", "Person")
      const name = graph.addNode("DataElement", "Name")
      const code = graph.addNode("Concept", "Code")
      graph.connect("dataset1", person, "1..n", 1)
      graph.connect(person, name, "0..1")
      graph.connect("dataset1", code)
      graph.updateConstraints(code, { inValues: ["x", "y"] })
      graph.setXoneGroups([[code]])
      const snapshot = graph.toSnapshot()

      const restored = SchemaGraph.fromSnapshot(snapshot, config())

      expect(restored.toSnapshot()).toEqual(snapshot)
    })

    it("should repair connections and edges that don't match", () => {
      const restored = SchemaGraph.fromSnapshot(
        {
          nodes: {
            ds: { id: "ds", kind: "Dataset", title: "Tiere", description: "", datatype: "xsd:string", constraints: { inValues: [] }, connections: ["a"], xoneGroups: [["a", "ghost"]] },
            a: { id: "a", kind: "DataElement", title: "A", description: "", datatype: "xsd:string", constraints: { inValues: [] }, connections: ["missing"] },
          },
          edges: { "a-ghost": { from: "a", to: "ghost", cardinality: "1..1" } },
        },
        config(),
      )

      expect(restored.stats().nodes).toBe(2)
      expect(restored.findNode("dataset1")).toBeUndefined()
      expect(restored.getNode("a").connections).toEqual(new Set(["ds"]))
      expect(restored.listEdges()).toEqual([{ id: "ds-a", from: "ds", to: "a", cardinality: "1..1" }])
      expect(restored.getDataset().xoneGroups).toEqual([["a"]])
    })

    it("should require exactly one dataset", () => {
      const dataset = { kind: "Dataset" as const, title: "", description: "", datatype: "xsd:string", constraints: { inValues: [] }, connections: [] }

      expect(invalidState(() => SchemaGraph.fromSnapshot({ nodes: {}, edges: {} })).reason).toBe("NoDataset")
      expect(
        invalidState(() =>
          SchemaGraph.fromSnapshot({ nodes: { d1: { ...dataset, id: "d1" }, d2: { ...dataset, id: "d2" } }, edges: {} }),
        ).reason,
      ).toBe("DuplicateDataset")
    })
  })

  describe("compile()", () => {
    it("should compile the graph under its dataset title", () => {
      graph.updateNode("dataset1", { title: "Tiere" })
      graph.connect("dataset1", graph.addNode("DataElement", "PLZ"))

      const compiled = graph.compile({ baseUri: "https://example.org", now: () => new Date(2024, 2, 1, 12, 0) })

      expect(compiled.datasetId).toBe("tiere")
      expect(compiled.namespace).toBe("https://example.org/resources/datasets/tiere/structure/")
      expect(compiled.meta).toMatchObject({ nodeShapes: 1, propertyShapes: 1, lists: 0 })
    })

    it("should derive the dataset id from the placeholder title", () => {
      expect(graph.compile({ baseUri: "https://example.org" }).datasetId).toBe("dataset")
    })
  })
})
