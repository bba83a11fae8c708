/**
 * Cardinality Codec
 *
 * Grammar:
 *   <card>  ::= <min> ".." <max> | <exact>
 *   <max>   ::= <integer> | "n" | "*" | "unlimited"
 *
 * An undefined bound means "unset" for min and "unbounded" for max.
 */

export interface CardinalityBounds {
  min?: number
  max?: number
}

const UNBOUNDED = new Set(["n", "*", "unlimited"])
const DIGITS = /^\d+$/

/**
 * A bound in digits, or undefined when it is not one or would lose precision.
 */
function readBound(text: string): number | undefined {
  if (!DIGITS.test(text)) return undefined
  const value = Number.parseInt(text, 10)
  return Number.isSafeInteger(value) ? value : undefined
}

/**
 * Parse a cardinality string. Never throws; malformed input yields `{}`.
 *
 * @example
 * ```typescript
 * parseCardinality('1..1') // { min: 1, max: 1 }
 * parseCardinality('0..n') // { min: 0 }
 * parseCardinality('3')    // { min: 3, max: 3 }
 * parseCardinality('x..y') // {}
 * parseCardinality('0..1e21') // {}
 * ```
 */
export function parseCardinality(text: string | null | undefined): CardinalityBounds {
  if (typeof text !== "string") return {}
  const trimmed = text.trim()
  if (trimmed === "") return {}

  const separator = trimmed.indexOf("..")
  if (separator === -1) {
    if (UNBOUNDED.has(trimmed.toLowerCase())) return { min: 0 }
    const count = readBound(trimmed)
    return count === undefined ? {} : { min: count, max: count }
  }

  const minText = trimmed.slice(0, separator).trim()
  const maxText = trimmed.slice(separator + 2).trim()

  const bounds: CardinalityBounds = {}
  if (minText !== "") {
    const min = readBound(minText)
    if (min === undefined) return {}
    bounds.min = min
  }
  if (maxText === "" || UNBOUNDED.has(maxText.toLowerCase())) return bounds
  const max = readBound(maxText)
  if (max === undefined) return {}
  bounds.max = max
  return bounds
}

/**
 * Format bounds back into the textual grammar, using `n` for an unbounded max.
 * Left inverse of {@link parseCardinality}.
 */
export function formatCardinality(min?: number, max?: number): string {
  if (min === undefined && max === undefined) return ""
  const lower = min === undefined ? "" : String(min)
  const upper = max === undefined ? "n" : String(max)
  return `${lower}..${upper}`
}

/**
 * Whether a parse produced at least one bound.
 */
export function hasBounds(bounds: CardinalityBounds): boolean {
  return bounds.min !== undefined || bounds.max !== undefined
}
