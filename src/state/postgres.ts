/**
 * PostgreSQL storage: one row per binding, one row per session.
 */

import postgres from "postgres";
import type { Binding, PersistedState, Session } from "./types.ts";
import { bindingSchema, parseRecords, persist, sessionSchema, type StateStorage } from "./storage.ts";

interface BindingRow {
  channel_id: string;
  project_id: string;
  branch: string | null;
  bound_at: Date;
}

interface SessionRow {
  thread_id: string;
  channel_id: string;
  project_id: string;
  branch: string;
  mode: string;
  resume_token: string | null;
  status: string;
  created_at: Date;
  updated_at: Date;
  source_message_id: string | null;
  turns: number;
  last_error: string | null;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS branchline_bindings (
  channel_id TEXT PRIMARY KEY,
  project_id TEXT NOT NULL,
  branch TEXT,
  bound_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE TABLE IF NOT EXISTS branchline_sessions (
  thread_id TEXT PRIMARY KEY,
  channel_id TEXT NOT NULL,
  project_id TEXT NOT NULL,
  branch TEXT NOT NULL,
  mode TEXT NOT NULL,
  resume_token TEXT,
  status TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL,
  source_message_id TEXT,
  turns INTEGER NOT NULL DEFAULT 0,
  last_error TEXT
);

CREATE INDEX IF NOT EXISTS idx_branchline_sessions_source
  ON branchline_sessions(source_message_id);
`;

function rowToBinding(row: BindingRow): Record<string, unknown> {
  return {
    channelId: row.channel_id,
    projectId: row.project_id,
    branch: row.branch ?? undefined,
    boundAt: row.bound_at.toISOString(),
  };
}

function rowToSession(row: SessionRow): Record<string, unknown> {
  return {
    threadId: row.thread_id,
    channelId: row.channel_id,
    projectId: row.project_id,
    branch: row.branch,
    mode: row.mode,
    resumeToken: row.resume_token ?? undefined,
    status: row.status,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    sourceMessageId: row.source_message_id ?? undefined,
    turns: row.turns,
    lastError: row.last_error ?? undefined,
  };
}

export class PostgresStorage implements StateStorage {
  readonly description = "postgres";

  constructor(private sql: postgres.Sql) {}

  static connect(databaseUrl: string): PostgresStorage {
    return new PostgresStorage(
      postgres(databaseUrl, {
        max: 4,
        idle_timeout: 30,
        connect_timeout: 10,
        onnotice: () => {}, // CREATE IF NOT EXISTS notices
      }),
    );
  }

  async open(): Promise<PersistedState> {
    return persist("open the database", async () => {
      await this.sql.unsafe(SCHEMA);

      const bindingRows = await this.sql<BindingRow[]>`
        SELECT channel_id, project_id, branch, bound_at FROM branchline_bindings
      `;
      const sessionRows = await this.sql<SessionRow[]>`
        SELECT * FROM branchline_sessions ORDER BY created_at
      `;

      const warn = (msg: string) => console.warn(`[storage] ${msg}`);
      const state: PersistedState = {
        bindings: parseRecords(
          "binding",
          bindingRows.map((row): [string, unknown] => [row.channel_id, rowToBinding(row)]),
          bindingSchema,
          warn,
        ),
        sessions: parseRecords(
          "session",
          sessionRows.map((row): [string, unknown] => [row.thread_id, rowToSession(row)]),
          sessionSchema,
          warn,
        ),
      };
      console.log(
        `[storage] Loaded ${state.bindings.size} binding(s), ${state.sessions.size} session(s) from postgres`,
      );
      return state;
    });
  }

  async saveBinding(binding: Binding): Promise<void> {
    await persist("save binding", async () => {
      await this.sql`
        INSERT INTO branchline_bindings (channel_id, project_id, branch, bound_at)
        VALUES (${binding.channelId}, ${binding.projectId}, ${binding.branch ?? null}, ${binding.boundAt})
        ON CONFLICT (channel_id) DO UPDATE SET
          project_id = EXCLUDED.project_id,
          branch = EXCLUDED.branch,
          bound_at = EXCLUDED.bound_at
      `;
    });
  }

  async deleteBinding(channelId: string): Promise<void> {
    await persist("delete binding", async () => {
      await this.sql`
        DELETE FROM branchline_bindings WHERE channel_id = ${channelId}
      `;
    });
  }

  async saveSession(session: Session): Promise<void> {
    await persist("save session", async () => {
      await this.sql`
        INSERT INTO branchline_sessions (
          thread_id, channel_id, project_id, branch, mode, resume_token, status,
          created_at, updated_at, source_message_id, turns, last_error
        )
        VALUES (
          ${session.threadId},
          ${session.channelId},
          ${session.projectId},
          ${session.branch},
          ${session.mode},
          ${session.resumeToken ?? null},
          ${session.status},
          ${session.createdAt},
          ${session.updatedAt},
          ${session.sourceMessageId ?? null},
          ${session.turns},
          ${session.lastError ?? null}
        )
        ON CONFLICT (thread_id) DO UPDATE SET
          resume_token = EXCLUDED.resume_token,
          status = EXCLUDED.status,
          updated_at = EXCLUDED.updated_at,
          turns = EXCLUDED.turns,
          last_error = EXCLUDED.last_error
      `;
    });
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
