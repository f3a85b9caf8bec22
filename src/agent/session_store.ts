// src/agent/session_store.ts
import { randomUUID } from "node:crypto";
import { SessionNotFoundError } from "./errors.js";
import { QuerySession, type SessionDeps, type SessionOpts } from "./session.js";

export type StoreOpts = {
  newId?: () => string;
  now?: () => number;
  /** Sessions untouched for this long are dropped on the next create. */
  idleMs?: number;
  /** Least recently used sessions are evicted beyond this count. */
  maxSessions?: number;
};

type Entry = { session: QuerySession; lastSeen: number };

/**
 * In-memory sessions keyed by id. Nothing survives a restart.
 * Map order doubles as recency order: every access re-inserts the entry.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Entry>();
  private readonly newId: () => string;
  private readonly now: () => number;
  private readonly idleMs: number;
  private readonly maxSessions: number;

  constructor(
    private readonly deps: SessionDeps,
    private readonly opts: SessionOpts = {},
    { newId = randomUUID, now = Date.now, idleMs = 30 * 60_000, maxSessions = 1000 }: StoreOpts = {}
  ) {
    this.newId = newId;
    this.now = now;
    this.idleMs = idleMs;
    this.maxSessions = maxSessions;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): QuerySession {
    this.sweep();
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    const session = new QuerySession(this.newId(), this.deps, this.opts);
    this.sessions.set(session.id, { session, lastSeen: this.now() });
    return session;
  }

  get(id: string): QuerySession {
    const entry = this.sessions.get(id);
    if (!entry || this.expired(entry)) {
      this.sessions.delete(id);
      throw new SessionNotFoundError(id);
    }
    this.sessions.delete(id);
    this.sessions.set(id, { session: entry.session, lastSeen: this.now() });
    return entry.session;
  }

  delete(id: string): void {
    if (!this.sessions.delete(id)) throw new SessionNotFoundError(id);
  }

  /** Drops every idle session; returns how many went. */
  sweep(): number {
    let dropped = 0;
    for (const [id, entry] of this.sessions) {
      if (!this.expired(entry)) continue;
      this.sessions.delete(id);
      dropped++;
    }
    return dropped;
  }

  private expired(entry: Entry): boolean {
    return this.now() - entry.lastSeen > this.idleMs;
  }
}
