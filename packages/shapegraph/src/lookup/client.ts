/**
 * Concept Lookup Client
 *
 * Read-only access to the public catalogue. No method rejects: network,
 * HTTP and parse failures are logged and surface as an empty result.
 */

import type { ShapeGraphConfig } from "../config"
import { CollaboratorError } from "../errors"
import { createLogger, type Logger } from "../logger"
import {
  catalogItemSchema,
  codelistResponseSchema,
  conceptResponseSchema,
  searchResponseSchema,
  type CatalogItem,
  type CodelistEntry,
  type ConceptRecord,
} from "./schemas"

const COLLABORATOR = "i14y"
const DEFAULT_PAGE_SIZE = 20

/**
 * Lookup contract consumed by constraint sources and outer layers.
 */
export interface ConceptLookup {
  searchConcepts(query: string, page?: number, pageSize?: number): Promise<ConceptRecord[]>
  searchDatasets(query: string, page?: number, pageSize?: number): Promise<ConceptRecord[]>
  getConcept(id: string): Promise<ConceptRecord | undefined>
  getCodelistEntries(id: string): Promise<CodelistEntry[]>
  /** Canonical IRI of a concept */
  conceptUri(id: string): string
  /** Canonical IRI of a catalogue dataset */
  datasetUri(id: string): string
}

export interface LookupClientOptions {
  /** Catalogue search API */
  lookupBaseUrl: string
  /** Public concept API */
  publicApiBaseUrl: string
  /** Base of canonical concept IRIs */
  conceptBaseUri: string
  /** Base of catalogue dataset IRIs */
  datasetBaseUri: string
  timeoutMs: number
  fetch?: typeof fetch
  logger?: Logger
}

/**
 * HTTP client for the I14Y catalogue.
 *
 * @example
 * ```typescript
 * const lookup = new I14yLookupClient(lookupOptionsFromConfig(loadConfig()))
 * const [first] = await lookup.searchConcepts('Geschlecht')
 * ```
 */
export class I14yLookupClient implements ConceptLookup {
  private readonly fetch: typeof fetch
  private readonly logger: Logger

  constructor(private readonly options: LookupClientOptions) {
    this.fetch = options.fetch ?? ((input, init) => globalThis.fetch(input, init))
    this.logger = options.logger ?? createLogger({ component: "I14yLookupClient" })
  }

  conceptUri(id: string): string {
    return `${trimSlash(this.options.conceptBaseUri)}/${id}/description`
  }

  datasetUri(id: string): string {
    return `${trimSlash(this.options.datasetBaseUri)}/${id}/description`
  }

  searchConcepts(query: string, page?: number, pageSize?: number): Promise<ConceptRecord[]> {
    return this.search("Concept", query, page, pageSize)
  }

  searchDatasets(query: string, page?: number, pageSize?: number): Promise<ConceptRecord[]> {
    return this.search("Dataset", query, page, pageSize)
  }

  async getConcept(id: string): Promise<ConceptRecord | undefined> {
    if (id.trim() === "") return undefined

    const url = `${trimSlash(this.options.publicApiBaseUrl)}/concepts/${encodeURIComponent(id)}`
    const body = await this.getJson(url)
    if (body === undefined) return undefined

    const parsed = conceptResponseSchema.safeParse(body)
    if (!parsed.success) {
      this.reportFailure(url, "Unexpected concept payload")
      return undefined
    }
    return this.toRecord(parsed.data, this.conceptUri(parsed.data.id))
  }

  async getCodelistEntries(id: string): Promise<CodelistEntry[]> {
    if (id.trim() === "") return []

    const url = `${trimSlash(this.options.publicApiBaseUrl)}/concepts/${encodeURIComponent(id)}/codelist-entries/exports/json`
    const body = await this.getJson(url)
    if (body === undefined) return []

    const parsed = codelistResponseSchema.safeParse(body)
    if (!parsed.success) {
      this.reportFailure(url, "Unexpected codelist payload")
      return []
    }
    return parsed.data
  }

  // ---------------------------------------------------------------------------
  // INTERNALS
  // ---------------------------------------------------------------------------

  /**
   * The search endpoint has no paging, so the page is cut client-side.
   */
  private async search(
    type: "Concept" | "Dataset",
    query: string,
    page = 1,
    pageSize = DEFAULT_PAGE_SIZE,
  ): Promise<ConceptRecord[]> {
    const text = query.trim()
    if (text === "") return []

    const params = new URLSearchParams({ types: type, query: text })
    const url = `${trimSlash(this.options.lookupBaseUrl)}/search?${params.toString()}`
    const body = await this.getJson(url)
    if (body === undefined) return []

    const parsed = searchResponseSchema.safeParse(body)
    if (!parsed.success) {
      this.reportFailure(url, "Search response is not a list")
      return []
    }

    const records = parsed.data.flatMap((item) => {
      const entry = catalogItemSchema.safeParse(item)
      if (!entry.success) return []
      const uri = type === "Dataset" ? this.datasetUri(entry.data.id) : this.conceptUri(entry.data.id)
      return [this.toRecord(entry.data, uri)]
    })

    const size = positiveInt(pageSize, DEFAULT_PAGE_SIZE)
    const start = (positiveInt(page, 1) - 1) * size
    return records.slice(start, start + size)
  }

  private async getJson(url: string): Promise<unknown> {
    try {
      const response = await this.fetch(url, {
        headers: { accept: "application/json" },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      })

      if (response.status === 404) {
        this.logger.debug({ url }, "Catalogue entry not found")
        return undefined
      }
      if (!response.ok) {
        this.reportFailure(url, `HTTP ${response.status}`)
        return undefined
      }

      return await response.json()
    } catch (error) {
      this.reportFailure(url, "Request failed", error)
      return undefined
    }
  }

  private reportFailure(url: string, message: string, cause?: unknown): void {
    const err = new CollaboratorError(
      `${message}: ${url}`,
      COLLABORATOR,
      cause instanceof Error ? cause : undefined,
    )
    this.logger.warn({ err, url }, "Catalogue lookup degraded to an empty result")
  }

  private toRecord(item: CatalogItem, uri: string): ConceptRecord {
    return {
      id: item.id,
      uri,
      title: item.title ?? item.name ?? "",
      description: item.description ?? "",
      raw: item,
    }
  }
}

/**
 * Lookup client options from the runtime configuration. Without a logger,
 * one is created at the configured level.
 */
export function lookupOptionsFromConfig(
  config: ShapeGraphConfig,
  overrides: { fetch?: typeof fetch; logger?: Logger } = {},
): LookupClientOptions {
  return {
    lookupBaseUrl: config.lookupBaseUrl,
    publicApiBaseUrl: config.publicApiBaseUrl,
    conceptBaseUri: config.conceptBaseUri,
    datasetBaseUri: config.datasetBaseUri,
    timeoutMs: config.lookupTimeoutMs,
    logger: overrides.logger ?? createLogger({ component: "I14yLookupClient", level: config.logLevel }),
    ...(overrides.fetch ? { fetch: overrides.fetch } : {}),
  }
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, "")
}

function positiveInt(value: number, fallback: number): number {
  return Number.isFinite(value) && value >= 1 ? Math.trunc(value) : fallback
}
