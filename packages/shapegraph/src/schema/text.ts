/**
 * Localized Text Helpers
 */

import type { Language, LocalizedText } from "./types"

/**
 * Order used to pick a single display string.
 */
export const DISPLAY_FALLBACK: readonly Language[] = ["de", "en", "fr", "it", "rm"]

/**
 * Resolve a title or description to one display string.
 * Falls back de → en → fr → it → rm → first non-empty value.
 */
export function resolveText(text: LocalizedText | undefined): string {
  if (text === undefined) return ""
  if (typeof text === "string") return text

  for (const lang of DISPLAY_FALLBACK) {
    const value = text[lang]
    if (value) return value
  }
  for (const value of Object.values(text)) {
    if (value) return value
  }
  return ""
}

/**
 * Check whether a text carries any non-empty content.
 */
export function hasText(text: LocalizedText | undefined): boolean {
  return resolveText(text).trim() !== ""
}
