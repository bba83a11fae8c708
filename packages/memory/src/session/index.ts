/**
 * Session Module
 */

export { SessionStore, createSessionStore, sessionOptionsFromConfig } from "./session-store"
export type { SessionStoreOptions, SessionInfo } from "./session-store"
