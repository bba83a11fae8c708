/**
 * RDF Vocabulary
 *
 * Namespaces and terms used by the shapes document.
 */

export const RDF = "http://www.w3.org/1999/02/22-rdf-syntax-ns#"
export const RDFS = "http://www.w3.org/2000/01/rdf-schema#"
export const XSD = "http://www.w3.org/2001/XMLSchema#"
export const XML = "http://www.w3.org/XML/1998/namespace"
export const QB = "http://purl.org/linked-data/cube#"
export const DCTERMS = "http://purl.org/dc/terms/"
export const OWL = "http://www.w3.org/2002/07/owl#"
export const PAV = "http://purl.org/pav/"
export const SCHEMA = "https://schema.org/"
export const SH = "http://www.w3.org/ns/shacl#"

/**
 * Prefix name of the dataset structure namespace.
 */
export const STRUCTURE_PREFIX = "i14y"

/**
 * Fixed prefix order of every emitted document. `i14y` is bound per
 * document to the dataset's structure namespace.
 */
export const FIXED_PREFIX_ORDER = [
  "rdf",
  "rdfs",
  "xsd",
  "xml",
  "QB",
  "dcterms",
  STRUCTURE_PREFIX,
  "owl",
  "pav",
  "schema",
  "sh",
] as const

export type FixedPrefix = (typeof FIXED_PREFIX_ORDER)[number]

/**
 * Prefix table for a document rooted at the given structure namespace.
 */
export function fixedPrefixes(namespace: string): Record<FixedPrefix, string> {
  return {
    rdf: RDF,
    rdfs: RDFS,
    xsd: XSD,
    xml: XML,
    QB: QB,
    dcterms: DCTERMS,
    [STRUCTURE_PREFIX]: namespace,
    owl: OWL,
    pav: PAV,
    schema: SCHEMA,
    sh: SH,
  }
}

export const terms = {
  type: `${RDF}type`,
  first: `${RDF}first`,
  rest: `${RDF}rest`,
  nil: `${RDF}nil`,

  label: `${RDFS}label`,
  comment: `${RDFS}comment`,
  range: `${RDFS}range`,
  Class: `${RDFS}Class`,

  title: `${DCTERMS}title`,
  description: `${DCTERMS}description`,
  conformsTo: `${DCTERMS}conformsTo`,

  DatatypeProperty: `${OWL}DatatypeProperty`,
  ObjectProperty: `${OWL}ObjectProperty`,

  DataStructureDefinition: `${QB}DataStructureDefinition`,
  AttributeProperty: `${QB}AttributeProperty`,
  CodedProperty: `${QB}CodedProperty`,

  pavVersion: `${PAV}version`,
  schemaVersion: `${SCHEMA}version`,
  validFrom: `${SCHEMA}validFrom`,

  NodeShape: `${SH}NodeShape`,
  PropertyShape: `${SH}PropertyShape`,
  property: `${SH}property`,
  path: `${SH}path`,
  datatype: `${SH}datatype`,
  minCount: `${SH}minCount`,
  maxCount: `${SH}maxCount`,
  minLength: `${SH}minLength`,
  maxLength: `${SH}maxLength`,
  pattern: `${SH}pattern`,
  node: `${SH}node`,
  order: `${SH}order`,
  in: `${SH}in`,
  xone: `${SH}xone`,
  closed: `${SH}closed`,
  name: `${SH}name`,
  shDescription: `${SH}description`,

  string: `${XSD}string`,
  integer: `${XSD}integer`,
  boolean: `${XSD}boolean`,
  date: `${XSD}date`,
} as const

/**
 * Resolve a datatype reference to an IRI.
 * `xsd:` names resolve against the XSD namespace; anything else is taken as
 * an IRI; empty means `xsd:string`.
 */
export function resolveDatatype(datatype: string | undefined): string {
  const value = datatype?.trim() ?? ""
  if (value === "") return terms.string
  if (value.startsWith("xsd:")) return XSD + value.slice(4)
  return value
}
