/**
 * Record Constraint Source
 *
 * Reads constraint facts that the catalogue record states explicitly.
 */

import { LANGUAGES } from "../schema/types"
import type { CodelistEntry, ConceptRecord } from "../lookup/schemas"
import type { ConstraintFacts, ConstraintSource } from "./types"

const DATATYPE_HINT_KEYS = ["datatype", "conceptValueType", "format"] as const
const INLINE_CODELIST_KEYS = ["codeListEntries", "codelistEntries", "entries"] as const
const CODE_KEYS = ["code", "value", "identifier", "id", "key", "Code", "Value"] as const
const LABEL_KEYS = ["name", "title", "label"] as const
const LABEL_LANGUAGES = LANGUAGES.filter((lang) => lang !== "rm")

/**
 * Map a free-form datatype hint to an XSD datatype.
 *
 * @example
 * ```typescript
 * mapDatatypeHint('DateTime') // 'xsd:dateTime'
 * mapDatatypeHint('Numeric')  // 'xsd:decimal'
 * mapDatatypeHint('CodeList') // undefined
 * ```
 */
export function mapDatatypeHint(hint: string): string | undefined {
  const value = hint.trim().toLowerCase()
  if (value === "") return undefined
  if (value.startsWith("xsd:")) return hint.trim()

  if (value.includes("date") && value.includes("time")) return "xsd:dateTime"
  if (value.includes("date")) return "xsd:date"
  if (value.includes("bool")) return "xsd:boolean"
  if (value.includes("uri") || value.includes("url")) return "xsd:anyURI"
  if (/int|number|decimal|float|numeric/.test(value)) return "xsd:decimal"
  if (value.includes("string") || value.includes("text")) return "xsd:string"
  return undefined
}

/**
 * The value a codelist entry contributes to an enumeration.
 * Prefers a code; falls back to a label resolved de → en → fr → it.
 */
export function codelistValue(entry: CodelistEntry): string | undefined {
  for (const key of CODE_KEYS) {
    const value = scalarText(entry[key])
    if (value !== undefined) return value
  }

  for (const key of LABEL_KEYS) {
    const label = entry[key]
    const direct = scalarText(label)
    if (direct !== undefined) return direct
    if (isRecord(label)) {
      for (const lang of LABEL_LANGUAGES) {
        const value = scalarText(label[lang])
        if (value !== undefined) return value
      }
    }
  }

  return undefined
}

/**
 * Values of every usable entry, in order, without repeats.
 */
export function codelistValues(entries: readonly CodelistEntry[]): string[] {
  const values = new Set<string>()
  for (const entry of entries) {
    const value = codelistValue(entry)
    if (value !== undefined) values.add(value)
  }
  return [...values]
}

export class RecordConstraintSource implements ConstraintSource {
  readonly name = "record"

  async extract(record: ConceptRecord): Promise<ConstraintFacts> {
    return this.read(record)
  }

  /**
   * Synchronous core of {@link extract}.
   */
  read(record: ConceptRecord): ConstraintFacts {
    const raw = record.raw
    const facts: ConstraintFacts = {}

    const pattern = scalarText(raw.pattern)
    if (pattern !== undefined) facts.pattern = pattern

    const minLength = nonNegativeInt(raw.minLength)
    if (minLength !== undefined) facts.minLength = minLength
    const maxLength = nonNegativeInt(raw.maxLength)
    if (maxLength !== undefined) facts.maxLength = maxLength

    for (const key of DATATYPE_HINT_KEYS) {
      const hint = scalarText(raw[key])
      const datatype = hint === undefined ? undefined : mapDatatypeHint(hint)
      if (datatype !== undefined) {
        facts.datatype = datatype
        break
      }
    }

    for (const key of INLINE_CODELIST_KEYS) {
      const entries = raw[key]
      if (!Array.isArray(entries)) continue
      const values = codelistValues(entries.filter(isRecord))
      if (values.length > 0) {
        facts.inValues = values
        break
      }
    }

    return facts
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function scalarText(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return String(value)
  if (typeof value !== "string") return undefined
  const trimmed = value.trim()
  return trimmed === "" ? undefined : trimmed
}

function nonNegativeInt(value: unknown): number | undefined {
  const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 0) return undefined
  return parsed
}
