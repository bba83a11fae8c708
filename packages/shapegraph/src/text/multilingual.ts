/**
 * Multilingual Text Policy
 *
 * Decides which language-tagged literals a subject receives. Only the four
 * emitted languages take part; identical content is kept once, under the
 * highest-priority language that carries it.
 */

import type { Language, LocalizedText } from "../schema/types"

/**
 * Languages written to the shapes document, in priority order.
 */
export const EMITTED_LANGUAGES = ["de", "en", "fr", "it"] as const satisfies readonly Language[]

export type EmittedLanguage = (typeof EMITTED_LANGUAGES)[number]

export interface LanguageValue {
  lang: EmittedLanguage
  /** Whitespace-collapsed text, ready to become a literal */
  text: string
}

/**
 * Collapse every whitespace run to a single space and trim.
 */
export function collapseWhitespace(text: string | null | undefined): string {
  if (text === null || text === undefined) return ""
  return String(text).split(/\s+/).filter(Boolean).join(" ")
}

/**
 * Collapse whitespace and escape double quotes.
 * The result is the content identity used when comparing literals.
 */
export function sanitizeLiteral(text: string | null | undefined): string {
  return collapseWhitespace(text).replace(/"/g, '\\"')
}

/**
 * Normalize a title or description to a per-language map.
 * Plain text is treated as German.
 */
export function toLanguageMap(text: LocalizedText | undefined): Partial<Record<Language, string>> {
  if (text === undefined) return {}
  if (typeof text === "string") return text === "" ? {} : { de: text }
  return text
}

/**
 * Pick the literals to emit for one text.
 *
 * @example
 * ```typescript
 * uniqueLanguageValues({ de: 'Hund', en: 'Dog', fr: 'Hund' })
 * // [{ lang: 'de', text: 'Hund' }, { lang: 'en', text: 'Dog' }]
 * ```
 */
export function uniqueLanguageValues(text: LocalizedText | undefined): LanguageValue[] {
  const map = toLanguageMap(text)
  const seen = new Set<string>()
  const values: LanguageValue[] = []

  for (const lang of EMITTED_LANGUAGES) {
    const cleaned = collapseWhitespace(map[lang])
    if (cleaned === "") continue
    const key = sanitizeLiteral(cleaned)
    if (seen.has(key)) continue
    seen.add(key)
    values.push({ lang, text: cleaned })
  }

  return values
}

/**
 * Recorded when a second, different literal targets a (subject, predicate,
 * language) key that already holds one.
 */
export interface DuplicateContentWarning {
  type: "DuplicateContent"
  subject: string
  predicate: string
  lang: string
  existing: string
  attempted: string
}

/**
 * Guards (subject, predicate, language) so that each key receives at most
 * one literal.
 */
export class LiteralTracker {
  private readonly entries = new Map<string, string>()
  private readonly recorded: DuplicateContentWarning[] = []

  /**
   * Claim a key for the given content.
   * Returns false when the key is taken; differing content is recorded.
   */
  claim(subject: string, predicate: string, lang: string, text: string): boolean {
    const key = `${subject}\u0000${predicate}\u0000${lang}`
    const content = sanitizeLiteral(text)
    const existing = this.entries.get(key)

    if (existing !== undefined) {
      if (existing !== content) {
        this.recorded.push({
          type: "DuplicateContent",
          subject,
          predicate,
          lang,
          existing,
          attempted: content,
        })
      }
      return false
    }

    this.entries.set(key, content)
    return true
  }

  get warnings(): readonly DuplicateContentWarning[] {
    return this.recorded
  }
}
