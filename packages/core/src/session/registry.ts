import { logger } from '../utils/logger.js';
import { SessionStatus } from './types.js';
import type { Session, SessionView } from './types.js';

/** What happened to an entry; delivered to subscribers after the write. */
export interface RegistryChange {
  kind: 'upsert' | 'update' | 'remove';
  id: string;
  /** The stored entry after the change, `null` on remove. */
  session: Readonly<Session> | null;
}

export type RegistryListener = (change: RegistryChange) => void;

/**
 * Applies a status transition to a session value without storing it.
 *
 * The current status shifts into `previousStatus`. Entering `seen` marks the
 * session acknowledged; entering `working` clears the acknowledgment. Returns
 * the same object when the status does not change.
 */
export function applyTransition(session: Session, next: SessionStatus): Session {
  if (session.status === next) return session;

  let acknowledged = session.acknowledged;
  if (next === SessionStatus.Seen) acknowledged = true;
  else if (next === SessionStatus.Working) acknowledged = false;

  return {
    ...session,
    previousStatus: session.status,
    status: next,
    acknowledged,
  };
}

/**
 * In-memory, single source of truth for tracked sessions.
 *
 * Entries are frozen and replaced wholesale, so a reader holding a reference
 * never sees a half-applied update. Every mutation runs synchronously to
 * completion on the event loop, which serializes writers from the poller and
 * the controller without a lock.
 */
export class SessionRegistry {
  private readonly entries = new Map<string, Readonly<Session>>();
  private readonly listeners = new Set<RegistryListener>();
  /** Registry version at which each id was last removed. */
  private readonly removals = new Map<string, number>();
  private active: string | null = null;
  private revision = 0;

  /** Incremented on every mutation; lets renderers skip unchanged frames. */
  get version(): number {
    return this.revision;
  }

  /** Id of the session the operator last switched to. */
  get activeId(): string | null {
    return this.active;
  }

  /** Insert or replace the entry for `session.id`. */
  upsert(session: Session): void {
    const stored = Object.freeze({ ...session });
    this.entries.set(session.id, stored);
    this.removals.delete(session.id);
    this.commit({ kind: 'upsert', id: session.id, session: stored });
  }

  /** Delete an entry. Absent ids are a no-op, since removal paths race. */
  remove(id: string): boolean {
    if (!this.entries.delete(id)) return false;
    if (this.active === id) this.active = null;
    this.commit({ kind: 'remove', id, session: null });
    this.removals.set(id, this.revision);
    return true;
  }

  /**
   * True when `id` was removed after the registry stood at `version`.
   * Lets a reader holding an older multiplexer listing tell a deleted
   * session from one it has not seen yet.
   */
  removedSince(id: string, version: number): boolean {
    return (this.removals.get(id) ?? -1) > version;
  }

  get(id: string): Readonly<Session> | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Point-in-time snapshot ordered by creation time, then id. */
  list(): ReadonlyArray<Readonly<Session>> {
    return [...this.entries.values()].sort(
      (a, b) => a.createdAt - b.createdAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    );
  }

  /** The rendering projection of `list()`. */
  view(): SessionView[] {
    return this.list().map((s) => this.project(s));
  }

  /** The rendering projection of a single entry. */
  viewOf(id: string): SessionView | undefined {
    const session = this.entries.get(id);
    return session ? this.project(session) : undefined;
  }

  /**
   * Atomically replace an entry with `updater(current)`.
   * No-op when the id is gone. `lastChangedAt` is clamped so it never moves backwards.
   */
  update(id: string, updater: (current: Readonly<Session>) => Session): boolean {
    const current = this.entries.get(id);
    if (!current) return false;

    const next = updater(current);
    if (next === current) return true;

    const stored = Object.freeze({
      ...next,
      id: current.id,
      createdAt: current.createdAt,
      lastChangedAt: Math.max(current.lastChangedAt, next.lastChangedAt),
    });
    this.entries.set(id, stored);
    this.commit({ kind: 'update', id, session: stored });
    return true;
  }

  /**
   * Move a session to `next`. No-op (false) if the session was removed
   * concurrently or already holds that status.
   */
  transition(id: string, next: SessionStatus): boolean {
    const current = this.entries.get(id);
    if (!current || current.status === next) return false;
    return this.update(id, (s) => applyTransition(s, next));
  }

  /** Record which session the operator is looking at. */
  setActive(id: string | null): void {
    if (id !== null && !this.entries.has(id)) return;
    if (this.active === id) return;
    this.active = id;
    this.revision++;
  }

  /** Register a change listener. Returns the unsubscribe function. */
  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private project(s: Readonly<Session>): SessionView {
    return {
      id: s.id,
      displayName: s.displayName,
      status: s.status,
      createdAt: s.createdAt,
      lastVisitedAt: s.lastVisitedAt,
      stale: s.stale,
      active: s.id === this.active,
    };
  }

  private commit(change: RegistryChange): void {
    this.revision++;
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (err) {
        logger.warn(`Registry listener failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
