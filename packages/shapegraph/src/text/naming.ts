/**
 * Naming Scheme
 *
 * Turns free-text titles into IRI path segments and hands out the IRIs of
 * the shapes in one document.
 */

export type IdCase = "lower" | "upper"

const ILLEGAL_SEGMENT_CHARS = /[<>"{}|\\^`/?#%]/g

function normalize(label: string, fallback: string): string {
  const cleaned = label
    .trim()
    .replace(/[\s-]/g, "_")
    .replace(/[()]/g, "")
    .replace(ILLEGAL_SEGMENT_CHARS, "")
    .replace(/_{2,}/g, "_")
    .replace(/^_+|_+$/g, "")
  return cleaned === "" ? fallback : cleaned
}

/**
 * Normalize a dataset title into its identifier.
 *
 * @example
 * ```typescript
 * normalizeDatasetId('My Data-Set (v2)', 'lower') // 'my_data_set_v2'
 * normalizeDatasetId('', 'upper')                 // 'dataset'
 * ```
 */
export function normalizeDatasetId(title: string, idCase: IdCase = "lower"): string {
  const cased = idCase === "upper" ? title.toUpperCase() : title.toLowerCase()
  return normalize(cased, "dataset")
}

/**
 * Normalize a class or property title into a path segment.
 */
export function normalizeSegment(label: string): string {
  return normalize(label, "property")
}

/**
 * Namespace under which every shape of a dataset lives.
 */
export function structureNamespace(baseUri: string, datasetId: string): string {
  return `${baseUri.replace(/\/+$/, "")}/resources/datasets/${datasetId}/structure/`
}

export interface AllocatedUri {
  iri: string
  /** Segment actually used, including any collision suffix */
  segment: string
}

/**
 * Hands out IRIs inside one namespace. A path already taken gets a numeric
 * suffix (`_2`, `_3`, ...), so two siblings with the same title stay apart.
 */
export class UriAllocator {
  private readonly taken = new Set<string>()

  constructor(readonly namespace: string) {}

  /**
   * Reserve a path verbatim. Used for IRIs that must not move, like the
   * dataset shape itself.
   */
  reserve(path: string): string {
    this.taken.add(path)
    return this.namespace + path
  }

  /**
   * Allocate `<namespace><prefix><segment><suffix>`, numbering on collision.
   */
  allocate(segment: string, prefix = "", suffix = ""): AllocatedUri {
    let used = segment
    for (let n = 2; this.taken.has(`${prefix}${used}${suffix}`); n++) {
      used = `${segment}_${n}`
    }
    this.taken.add(`${prefix}${used}${suffix}`)
    return { iri: `${this.namespace}${prefix}${used}${suffix}`, segment: used }
  }
}
