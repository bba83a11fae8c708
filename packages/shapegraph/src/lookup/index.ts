/**
 * Lookup Module
 */

export { I14yLookupClient, lookupOptionsFromConfig } from "./client"
export type { ConceptLookup, LookupClientOptions } from "./client"
export {
  toLocalizedText,
  apiTextSchema,
  catalogItemSchema,
  conceptResponseSchema,
  codelistResponseSchema,
} from "./schemas"
export type { ConceptRecord, CodelistEntry, CatalogItem } from "./schemas"
