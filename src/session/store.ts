import { randomUUID } from "crypto";
import { logSession } from "../logging.js";
import type { ModelTier } from "../evaluator/criteria.js";
import { SessionState } from "./state.js";

export interface SessionStoreOptions {
  ttlMs: number;
  maxRecords: number;
  defaultTier: ModelTier;
}

/**
 * Registry of live sessions, keyed by session id.
 * A session expires after `ttlMs` without a request.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(private readonly opts: SessionStoreOptions) {}

  /**
   * Resolve the session for an incoming request. Unknown, expired or missing
   * ids get a fresh session. Every hit refreshes the idle timer.
   */
  resolve(sessionId: string | undefined): { session: SessionState; created: boolean } {
    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      this.touch(existing.id);
      return { session: existing, created: false };
    }
    return { session: this.create(), created: true };
  }

  create(): SessionState {
    const session = new SessionState(randomUUID(), {
      maxRecords: this.opts.maxRecords,
      defaultTier: this.opts.defaultTier,
    });
    this.sessions.set(session.id, session);
    this.touch(session.id);
    logSession.info({ sessionId: session.id, total: this.sessions.size }, "Session created");
    return session;
  }

  destroy(sessionId: string): boolean {
    const timer = this.timers.get(sessionId);
    if (timer) clearTimeout(timer);
    this.timers.delete(sessionId);
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      logSession.info({ sessionId, total: this.sessions.size }, "Session closed");
    }
    return removed;
  }

  size(): number {
    return this.sessions.size;
  }

  closeAll(): void {
    for (const id of [...this.sessions.keys()]) {
      this.destroy(id);
    }
  }

  private touch(sessionId: string): void {
    const existing = this.timers.get(sessionId);
    if (existing) clearTimeout(existing);
    const timer = setTimeout(() => {
      logSession.info({ sessionId }, "Session expired — cleaning up");
      this.destroy(sessionId);
    }, this.opts.ttlMs);
    // Idle timers must not keep the process alive on shutdown
    timer.unref();
    this.timers.set(sessionId, timer);
  }
}
