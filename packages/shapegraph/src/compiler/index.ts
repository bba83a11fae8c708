/**
 * Compiler Module
 *
 * Transforms a schema graph into a shapes document.
 */

// Provider interface
export type { ShapeCompilerProvider, ShapeCompilerFactory } from "./provider"

// Turtle compiler (default)
export {
  TurtleCompiler,
  createTurtleCompiler,
  N3TripleSink,
  documentPrefixes,
  renderPrefixBlock,
  finalizeTurtle,
} from "./turtle"
export type { TripleSink, TripleSubject, TripleObject } from "./turtle"

// Vocabulary
export { FIXED_PREFIX_ORDER, fixedPrefixes, resolveDatatype, terms } from "./vocabulary"
export * as ns from "./vocabulary"

// Types
export type { CompiledShapes, CompilerOptions } from "./types"
