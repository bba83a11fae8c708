/**
 * Catalogue Response Schemas
 *
 * The catalogue returns loosely shaped JSON. These schemas accept what is
 * usable and normalize it; anything else is dropped by the client.
 */

import { z } from "zod"
import { LANGUAGES, type Language, type LocalizedText } from "../schema/types"

/**
 * A concept or dataset as returned by a lookup.
 */
export interface ConceptRecord {
  id: string
  /** Canonical concept or dataset IRI */
  uri: string
  title: LocalizedText
  description: LocalizedText
  /** Untouched catalogue record */
  raw: Record<string, unknown>
}

export type CodelistEntry = Record<string, unknown>

/**
 * Keep the known languages with non-empty text.
 */
export function toLocalizedText(value: string | Record<string, string | null | undefined>): LocalizedText {
  if (typeof value === "string") return value
  const text: Partial<Record<Language, string>> = {}
  for (const lang of LANGUAGES) {
    const entry = value[lang]
    if (typeof entry === "string" && entry.trim() !== "") text[lang] = entry
  }
  return text
}

export const apiTextSchema = z
  .union([z.string(), z.record(z.string(), z.string().nullable().optional())])
  .transform(toLocalizedText)

export const catalogItemSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    title: apiTextSchema.optional(),
    name: apiTextSchema.optional(),
    description: apiTextSchema.optional(),
  })
  .passthrough()

export type CatalogItem = z.infer<typeof catalogItemSchema>

export const searchResponseSchema = z.array(z.unknown())

/**
 * Concept details, optionally wrapped in `{ data: ... }`.
 */
export const conceptResponseSchema = z.union([
  z.object({ data: catalogItemSchema }).passthrough().transform((body) => body.data),
  catalogItemSchema,
])

const entrySchema = z.record(z.string(), z.unknown())
const entriesSchema = z.array(z.unknown()).transform((items) =>
  items.flatMap((item) => {
    const parsed = entrySchema.safeParse(item)
    return parsed.success ? [parsed.data] : []
  }),
)

/**
 * Codelist export: a bare array, or an object holding the entries under one
 * of a few keys.
 */
export const codelistResponseSchema = z.union([
  entriesSchema,
  z.object({ entries: entriesSchema }).passthrough().transform((body) => body.entries),
  z.object({ items: entriesSchema }).passthrough().transform((body) => body.items),
  z.object({ codelistEntries: entriesSchema }).passthrough().transform((body) => body.codelistEntries),
  z.object({ data: entriesSchema }).passthrough().transform((body) => body.data),
])
