/**
 * Persisted records: channel bindings and per-thread sessions.
 */

/** A chat channel's association with a project and, optionally, a fixed branch. */
export interface Binding {
  channelId: string;
  projectId: string;
  /** When unset, the branch follows the channel name */
  branch?: string;
  /** ISO timestamp of the last `set` */
  boundAt: string;
}

export type SessionStatus = "idle" | "running" | "cancelled" | "completed" | "failed";

/**
 * - "chat": turns resume the thread's conversation; a completed session takes the next turn.
 * - "stateless": every turn starts fresh; a completed session is closed.
 */
export type SessionMode = "chat" | "stateless";

export interface Session {
  /** Primary key, immutable */
  threadId: string;
  /** Channel the thread lives in */
  channelId: string;
  projectId: string;
  branch: string;
  mode: SessionMode;
  /** Only ever set from a successful agent turn */
  resumeToken?: string;
  status: SessionStatus;
  createdAt: string;
  updatedAt: string;
  /** Channel message the thread was started from */
  sourceMessageId?: string;
  /** Completed turns */
  turns: number;
  /** Error text of the failed turn */
  lastError?: string;
}

export interface PersistedState {
  bindings: Map<string, Binding>;
  sessions: Map<string, Session>;
}
