/**
 * Thread → session table.
 *
 * Every mutation of a thread's session runs under that thread's key in a
 * KeyedQueue, so concurrent `findOrCreate` calls for a new thread produce a
 * single record and concurrent turns cannot interleave their updates.
 * Storage is flushed before memory changes (fail closed).
 */

import { KeyedQueue } from "./keyed-queue.ts";
import type { StateStorage } from "./storage.ts";
import type { Session, SessionMode, SessionStatus } from "./types.ts";

export interface SessionInit {
  channelId: string;
  projectId: string;
  branch: string;
  mode: SessionMode;
  sourceMessageId?: string;
}

export type SessionMutation =
  | { kind: "start" }
  | { kind: "complete"; resumeToken?: string }
  | { kind: "fail"; error: string };

export type UpdateResult =
  | { ok: true; session: Session }
  | { ok: false; reason: "StaleSession"; session: Session | undefined };

export const INTERRUPTED_ERROR = "Interrupted by a restart";

/** Whether the session can take another agent turn. */
export function acceptsTurns(session: Session): boolean {
  if (session.status === "idle") return true;
  return session.status === "completed" && session.mode === "chat";
}

/**
 * Apply a mutation, or return null when the session's status does not
 * allow it. Pure.
 */
export function applyMutation(session: Session, mutation: SessionMutation, now: string): Session | null {
  switch (mutation.kind) {
    case "start":
      if (!acceptsTurns(session)) return null;
      return { ...session, status: "running", updatedAt: now };

    case "complete": {
      if (session.status !== "running") return null;
      const resumeToken =
        session.mode === "chat" ? (mutation.resumeToken ?? session.resumeToken) : undefined;
      const next: Session = {
        ...session,
        status: "completed",
        turns: session.turns + 1,
        updatedAt: now,
      };
      delete next.lastError;
      if (resumeToken) next.resumeToken = resumeToken;
      else delete next.resumeToken;
      return next;
    }

    case "fail":
      if (session.status !== "running") return null;
      return { ...session, status: "failed", lastError: mutation.error, updatedAt: now };
  }
}

export class SessionTable {
  private readonly sessions: Map<string, Session>;
  private readonly bySourceMessage = new Map<string, string>();
  private readonly storage: StateStorage;
  private readonly locks = new KeyedQueue();
  private readonly now: () => Date;

  constructor(storage: StateStorage, initial: Map<string, Session>, now: () => Date = () => new Date()) {
    this.storage = storage;
    this.sessions = new Map(initial);
    this.now = now;
    for (const session of this.sessions.values()) {
      if (session.sourceMessageId) {
        this.bySourceMessage.set(session.sourceMessageId, session.threadId);
      }
    }
  }

  get(threadId: string): Session | undefined {
    return this.sessions.get(threadId);
  }

  /** Session whose thread was started from the given channel message. */
  findBySourceMessage(messageId: string): Session | undefined {
    const threadId = this.bySourceMessage.get(messageId);
    return threadId === undefined ? undefined : this.sessions.get(threadId);
  }

  list(filter: { status?: SessionStatus; channelId?: string } = {}): Session[] {
    return [...this.sessions.values()].filter(
      (s) =>
        (filter.status === undefined || s.status === filter.status) &&
        (filter.channelId === undefined || s.channelId === filter.channelId),
    );
  }

  /**
   * First writer wins: later callers for the same thread get the record the
   * first one created, never a second one.
   */
  findOrCreate(threadId: string, init: SessionInit): Promise<Session> {
    return this.locks.run(threadId, async () => {
      const existing = this.sessions.get(threadId);
      if (existing) return existing;

      const timestamp = this.now().toISOString();
      const session: Session = {
        threadId,
        channelId: init.channelId,
        projectId: init.projectId,
        branch: init.branch,
        mode: init.mode,
        status: "idle",
        createdAt: timestamp,
        updatedAt: timestamp,
        turns: 0,
        ...(init.sourceMessageId ? { sourceMessageId: init.sourceMessageId } : {}),
      };

      await this.storage.saveSession(session);
      this.sessions.set(threadId, session);
      if (session.sourceMessageId) {
        this.bySourceMessage.set(session.sourceMessageId, threadId);
      }
      console.log(
        `[sessions] Created ${threadId} (${session.projectId}@${session.branch}, ${session.mode})`,
      );
      return session;
    });
  }

  /**
   * Apply a mutation. A mutation the current status does not allow (for
   * example completing a cancelled turn) is a no-op reported as StaleSession.
   */
  update(threadId: string, mutation: SessionMutation): Promise<UpdateResult> {
    return this.locks.run(threadId, async (): Promise<UpdateResult> => {
      const current = this.sessions.get(threadId);
      const next = current ? applyMutation(current, mutation, this.now().toISOString()) : null;
      if (!current || !next) {
        console.warn(
          `[sessions] Stale ${mutation.kind} on ${threadId} (status: ${current?.status ?? "missing"})`,
        );
        return { ok: false, reason: "StaleSession", session: current };
      }

      await this.storage.saveSession(next);
      this.sessions.set(threadId, next);
      return { ok: true, session: next };
    });
  }

  /** running → cancelled. Returns false when there was nothing to cancel. */
  cancel(threadId: string): Promise<boolean> {
    return this.locks.run(threadId, async () => {
      const current = this.sessions.get(threadId);
      if (!current || current.status !== "running") return false;

      const next: Session = { ...current, status: "cancelled", updatedAt: this.now().toISOString() };
      await this.storage.saveSession(next);
      this.sessions.set(threadId, next);
      console.log(`[sessions] Cancelled ${threadId}`);
      return true;
    });
  }

  /**
   * running → failed for a turn that could not finish normally, usually
   * because its closing update could not be saved. Returns false when the
   * session was not running.
   * Memory changes even if this write fails too, so the thread is not left
   * busy; a restart settles the persisted `running` record the same way.
   */
  abandon(threadId: string, error: string): Promise<boolean> {
    return this.locks.run(threadId, async () => {
      const current = this.sessions.get(threadId);
      if (!current || current.status !== "running") return false;

      const next: Session = { ...current, status: "failed", lastError: error, updatedAt: this.now().toISOString() };
      try {
        await this.storage.saveSession(next);
      } catch (err) {
        console.error(`[sessions] Could not save the failed state of ${threadId}:`, err);
      }
      this.sessions.set(threadId, next);
      return true;
    });
  }

  /**
   * Mark sessions left `running` by a previous process as failed. Only the
   * bridge calls this, at startup, before it accepts events.
   */
  async settleInterrupted(): Promise<Session[]> {
    const settled: Session[] = [];
    for (const threadId of [...this.sessions.keys()]) {
      const session = await this.locks.run(threadId, async () => {
        const current = this.sessions.get(threadId);
        if (!current || current.status !== "running") return null;

        const next: Session = {
          ...current,
          status: "failed",
          lastError: INTERRUPTED_ERROR,
          updatedAt: this.now().toISOString(),
        };
        await this.storage.saveSession(next);
        this.sessions.set(threadId, next);
        return next;
      });
      if (session) settled.push(session);
    }
    if (settled.length > 0) {
      console.warn(`[sessions] Marked ${settled.length} interrupted session(s) as failed`);
    }
    return settled;
  }
}
