/**
 * Triple Sink
 *
 * Collects triples in insertion order and serializes them with n3's Writer.
 */

import { DataFactory, Writer } from "n3"
import type { BlankNode, Literal, NamedNode } from "n3"

const { quad } = DataFactory

export type TripleSubject = NamedNode | BlankNode
export type TripleObject = NamedNode | BlankNode | Literal

/**
 * Destination of emitted triples.
 */
export interface TripleSink {
  /** Add a triple. Returns false when the exact triple is already present. */
  add(subject: TripleSubject, predicate: NamedNode, object: TripleObject): boolean
  has(subject: TripleSubject, predicate: NamedNode, object: TripleObject): boolean
  readonly size: number
  /** Serialize everything added so far as Turtle */
  serialize(): string
}

interface Triple {
  subject: TripleSubject
  predicate: NamedNode
  object: TripleObject
}

function termKey(term: TripleSubject | TripleObject): string {
  switch (term.termType) {
    case "NamedNode":
      return `<${term.value}>`
    case "BlankNode":
      return `_:${term.value}`
    case "Literal":
      return `"${term.value}"@${term.language}^^${term.datatype.value}`
  }
}

/**
 * Triple sink backed by n3.
 */
export class N3TripleSink implements TripleSink {
  private readonly triples: Triple[] = []
  private readonly keys = new Set<string>()

  constructor(private readonly prefixes: Record<string, string> = {}) {}

  get size(): number {
    return this.triples.length
  }

  add(subject: TripleSubject, predicate: NamedNode, object: TripleObject): boolean {
    const key = this.key(subject, predicate, object)
    if (this.keys.has(key)) return false
    this.keys.add(key)
    this.triples.push({ subject, predicate, object })
    return true
  }

  has(subject: TripleSubject, predicate: NamedNode, object: TripleObject): boolean {
    return this.keys.has(this.key(subject, predicate, object))
  }

  serialize(): string {
    const writer = new Writer({ prefixes: this.prefixes })
    for (const triple of this.triples) {
      writer.addQuad(quad(triple.subject, triple.predicate, triple.object))
    }

    // The writer has no output stream, so end() reports synchronously.
    let output: string | undefined
    let failure: Error | undefined
    writer.end((error, result) => {
      if (error) failure = error
      else output = result
    })

    if (failure) throw failure
    if (output === undefined) throw new Error("Turtle writer finished without output")
    return output
  }

  private key(subject: TripleSubject, predicate: NamedNode, object: TripleObject): string {
    return `${termKey(subject)} <${predicate.value}> ${termKey(object)}`
  }
}
