/**
 * shapegraph-memory - In-Memory Schema Graphs
 *
 * The mutable schema graph, its command dispatcher and a session store
 * holding one graph per user session.
 *
 * @example
 * ```typescript
 * import { SessionStore, dispatch } from 'shapegraph-memory';
 *
 * const sessions = new SessionStore({ ttlMs: 15 * 60 * 1000 });
 * sessions.start();
 *
 * const id = sessions.create();
 * await sessions.withSession(id, (graph) =>
 *   dispatch(graph, { type: 'addNode', kind: 'Concept', title: { de: 'Hund', en: 'Dog' } }),
 * );
 * const { turtle } = await sessions.exportTurtle(id);
 *
 * sessions.stop();
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { SchemaGraph, createSchemaGraph } from "./graph"
export type { SchemaGraphConfig } from "./graph"

export { dispatch, apply } from "./commands"
export type { CommandResult } from "./commands"

// =============================================================================
// SESSIONS
// =============================================================================

export { SessionStore, createSessionStore, sessionOptionsFromConfig } from "./session"
export type { SessionStoreOptions, SessionInfo } from "./session"

// =============================================================================
// STORE (for advanced use cases)
// =============================================================================

export { GraphStore } from "./store"
export type { StoreData, StoreStats, TransactionSnapshot } from "./store"
