/**
 * Shape Compiler Provider Interface
 *
 * Abstraction layer for shape compilation.
 * Allows plugging different serializations of the same graph.
 */

import type { Logger } from "../logger"
import type { ShapeGraphView } from "../schema/types"
import type { CompiledShapes, CompilerOptions } from "./types"

// =============================================================================
// COMPILER PROVIDER INTERFACE
// =============================================================================

/**
 * Interface for compiling a schema graph into a shapes document.
 */
export interface ShapeCompilerProvider {
  /** Unique name for this compiler (e.g., 'turtle') */
  readonly name: string

  /**
   * Compile a graph into a shapes document.
   *
   * @throws InvalidStateError if the graph has no dataset
   */
  compile(graph: ShapeGraphView, options?: CompilerOptions): CompiledShapes
}

/**
 * Factory function type for creating compiler instances.
 */
export type ShapeCompilerFactory = (options?: CompilerOptions, logger?: Logger) => ShapeCompilerProvider
