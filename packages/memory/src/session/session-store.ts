/**
 * Session Store
 *
 * Owns one schema graph per session. Every operation on a session runs
 * through that session's promise chain, so a graph is never touched by two
 * operations at once and an export always sees a consistent graph. Idle
 * sessions are evicted by a periodic sweep.
 */

import { randomUUID } from "node:crypto"
import { InvalidStateError, NotFoundError, createLogger } from "shapegraph"
import type { CompiledShapes, CompilerOptions, Logger, ShapeGraphConfig } from "shapegraph"
import { SchemaGraph, type SchemaGraphConfig } from "../graph"

export interface SessionStoreOptions {
  /** Idle time after which a session is evicted (default: 30 minutes) */
  ttlMs?: number
  /** Interval of the eviction sweep (default: 1 minute) */
  sweepIntervalMs?: number
  /** Maximum number of live sessions (default: 1000) */
  maxSessions?: number
  /** Defaults applied to every export */
  compiler?: CompilerOptions
  /** Configuration for new graphs */
  graph?: SchemaGraphConfig
  logger?: Logger
  /** Clock in epoch milliseconds */
  now?: () => number
}

/**
 * Session details, without the graph.
 */
export interface SessionInfo {
  id: string
  createdAt: number
  lastAccessedAt: number
  /** Operations queued or running */
  pending: number
}

interface Session {
  id: string
  graph: SchemaGraph
  createdAt: number
  lastAccessedAt: number
  pending: number
  /** Settles when the last queued operation is done */
  tail: Promise<void>
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>()
  private sweepTimer: ReturnType<typeof setInterval> | null = null

  private readonly ttlMs: number
  private readonly sweepIntervalMs: number
  private readonly maxSessions: number
  private readonly compiler: CompilerOptions
  private readonly graphConfig: SchemaGraphConfig
  private readonly logger: Logger
  private readonly now: () => number

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? 30 * 60 * 1000
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000
    this.maxSessions = options.maxSessions ?? 1000
    this.compiler = options.compiler ?? {}
    this.logger = options.logger ?? createLogger({ component: "SessionStore" })
    this.graphConfig = { logger: this.logger, ...options.graph }
    this.now = options.now ?? (() => Date.now())
  }

  /**
   * Open a session holding a fresh graph.
   *
   * @throws InvalidStateError when the session limit is reached
   */
  create(): string {
    if (this.sessions.size >= this.maxSessions) {
      throw new InvalidStateError(`Session limit reached (${this.maxSessions})`, "SessionLimit")
    }

    const now = this.now()
    const session: Session = {
      id: randomUUID(),
      graph: new SchemaGraph(this.graphConfig),
      createdAt: now,
      lastAccessedAt: now,
      pending: 0,
      tail: Promise.resolve(),
    }
    this.sessions.set(session.id, session)
    this.logger.info({ sessionId: session.id, sessions: this.sessions.size }, "Session created")
    return session.id
  }

  has(id: string): boolean {
    return this.sessions.has(id)
  }

  /**
   * Close a session. Operations already queued still run on the graph.
   */
  delete(id: string): boolean {
    const deleted = this.sessions.delete(id)
    if (deleted) this.logger.info({ sessionId: id }, "Session deleted")
    return deleted
  }

  get size(): number {
    return this.sessions.size
  }

  /**
   * Session details without touching the access time.
   *
   * @throws NotFoundError if the session doesn't exist
   */
  info(id: string): SessionInfo {
    const session = this.require(id)
    return {
      id: session.id,
      createdAt: session.createdAt,
      lastAccessedAt: session.lastAccessedAt,
      pending: session.pending,
    }
  }

  /**
   * Run `fn` on the session's graph once every earlier operation on that
   * session has settled.
   *
   * @throws NotFoundError if the session doesn't exist
   */
  async withSession<T>(id: string, fn: (graph: SchemaGraph) => T | Promise<T>): Promise<T> {
    const session = this.require(id)
    session.pending += 1
    session.lastAccessedAt = this.now()

    const run = session.tail.then(() => fn(session.graph))
    session.tail = run.then(
      () => undefined,
      () => undefined,
    )

    try {
      return await run
    } finally {
      session.pending -= 1
      session.lastAccessedAt = this.now()
    }
  }

  /**
   * Compile the session's graph under the session lock.
   */
  async exportTurtle(id: string, options: CompilerOptions = {}): Promise<CompiledShapes> {
    const compiled = await this.withSession(id, (graph) => graph.compile({ ...this.compiler, ...options }))
    this.logger.info(
      { sessionId: id, datasetId: compiled.datasetId, triples: compiled.meta.triples },
      "Shapes exported",
    )
    return compiled
  }

  /**
   * Evict sessions idle for longer than the TTL. Sessions with queued or
   * running operations are kept.
   *
   * @returns ids of the evicted sessions
   */
  sweep(now: number = this.now()): string[] {
    const evicted: string[] = []
    for (const [id, session] of this.sessions) {
      if (session.pending === 0 && now - session.lastAccessedAt > this.ttlMs) {
        this.sessions.delete(id)
        evicted.push(id)
      }
    }
    if (evicted.length > 0) {
      this.logger.info({ evicted: evicted.length, sessions: this.sessions.size }, "Idle sessions evicted")
    }
    return evicted
  }

  /**
   * Start the periodic sweep. The timer doesn't keep the process alive.
   */
  start(): void {
    if (this.sweepTimer) return
    this.sweepTimer = setInterval(() => {
      this.sweep()
    }, this.sweepIntervalMs)
    this.sweepTimer.unref()
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer)
      this.sweepTimer = null
    }
  }

  private require(id: string): Session {
    const session = this.sessions.get(id)
    if (!session) throw new NotFoundError("session", id)
    return session
  }
}

/**
 * Session store options from the runtime configuration. Without a logger,
 * one is created at the configured level.
 */
export function sessionOptionsFromConfig(
  config: ShapeGraphConfig,
  logger?: Logger,
): SessionStoreOptions {
  return {
    ttlMs: config.sessionTtlMs,
    sweepIntervalMs: config.sessionSweepIntervalMs,
    maxSessions: config.maxSessions,
    compiler: {
      baseUri: config.baseUri,
      datasetIdCase: config.datasetIdCase,
      schemaVersion: config.schemaVersion,
    },
    logger: logger ?? createLogger({ component: "SessionStore", level: config.logLevel }),
  }
}

export function createSessionStore(options: SessionStoreOptions = {}): SessionStore {
  return new SessionStore(options)
}
