/**
 * Text Module
 */

export {
  EMITTED_LANGUAGES,
  collapseWhitespace,
  sanitizeLiteral,
  toLanguageMap,
  uniqueLanguageValues,
  LiteralTracker,
} from "./multilingual"
export type { EmittedLanguage, LanguageValue, DuplicateContentWarning } from "./multilingual"

export { normalizeDatasetId, normalizeSegment, structureNamespace, UriAllocator } from "./naming"
export type { IdCase, AllocatedUri } from "./naming"
