/**
 * Prefix Post-Processing
 *
 * The writer's own prefix lines are discarded and replaced with a block in
 * a fixed order, so the header of a document never depends on the writer.
 */

import { FIXED_PREFIX_ORDER, fixedPrefixes } from "../vocabulary"

const PREFIX_LINE = /^\s*(@prefix|PREFIX)\s/

/**
 * Every prefix of a document, fixed block first, extras after it.
 * An extra reusing a fixed name (or an earlier extra's name) is dropped.
 */
export function documentPrefixes(
  namespace: string,
  extra: Record<string, string> = {},
): Array<[name: string, iri: string]> {
  const fixed = fixedPrefixes(namespace)
  const entries: Array<[string, string]> = FIXED_PREFIX_ORDER.map((name) => [name, fixed[name]])
  const seen = new Set<string>(FIXED_PREFIX_ORDER)

  for (const [name, iri] of Object.entries(extra)) {
    if (seen.has(name)) continue
    seen.add(name)
    entries.push([name, iri])
  }

  return entries
}

/**
 * Render prefix declarations, one per line.
 */
export function renderPrefixBlock(prefixes: Array<[string, string]>): string {
  return prefixes.map(([name, iri]) => `@prefix ${name}: <${iri}>.`).join("\n")
}

/**
 * Replace the prefix declarations of a serialized document and drop its
 * empty lines.
 *
 * @example
 * ```typescript
 * finalizeTurtle(raw, 'https://example.org/resources/datasets/x/structure/')
 * // '@prefix rdf: <...>.\n...@prefix sh: <...>.\n\n<body>\n'
 * ```
 */
export function finalizeTurtle(
  serialized: string,
  namespace: string,
  extra: Record<string, string> = {},
): string {
  const body = serialized
    .split("\n")
    .filter((line) => !PREFIX_LINE.test(line) && line.trim() !== "")

  const header = renderPrefixBlock(documentPrefixes(namespace, extra))
  return body.length === 0 ? `${header}\n` : `${header}\n\n${body.join("\n")}\n`
}
