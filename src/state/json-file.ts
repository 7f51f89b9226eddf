/**
 * Single-document JSON storage. Every mutation rewrites the file through a
 * temp file + rename, synchronously, before the call resolves.
 *
 * Several processes may share the file (the bridge and the offline CLI).
 * Before each mutation the document is re-read when another writer has
 * replaced the file since our last read or write, so each write carries the
 * other writer's records forward instead of overwriting them.
 */

import fs from "node:fs";
import path from "node:path";
import type { Binding, PersistedState, Session } from "./types.ts";
import {
  bindingSchema,
  emptyState,
  parseRecords,
  persist,
  sessionSchema,
  type StateStorage,
} from "./storage.ts";

export const STATE_VERSION = 1;

interface StateFile {
  version: number;
  bindings: Record<string, Binding>;
  sessions: Record<string, Session>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Identity of the file on disk; every rename-based write changes the inode. */
function fingerprint(filePath: string): string | null {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  return stat ? `${stat.ino}:${stat.mtimeMs}:${stat.size}` : null;
}

export class JsonFileStorage implements StateStorage {
  private readonly filePath: string;
  private doc: StateFile = { version: STATE_VERSION, bindings: {}, sessions: {} };
  private seen: string | null = null;
  private opened = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get description(): string {
    return this.filePath;
  }

  async open(): Promise<PersistedState> {
    return persist("open the state file", () => {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const state = this.load();
      this.adopt(state);
      this.seen = fingerprint(this.filePath);
      this.opened = true;
      return state;
    });
  }

  async saveBinding(binding: Binding): Promise<void> {
    await this.mutate("save binding", (doc) => doc.bindings, binding.channelId, binding);
  }

  async deleteBinding(channelId: string): Promise<void> {
    await this.mutate<Binding>("delete binding", (doc) => doc.bindings, channelId, undefined);
  }

  async saveSession(session: Session): Promise<void> {
    await this.mutate("save session", (doc) => doc.sessions, session.threadId, session);
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  private adopt(state: PersistedState): void {
    this.doc = {
      version: STATE_VERSION,
      bindings: Object.fromEntries(state.bindings),
      sessions: Object.fromEntries(state.sessions),
    };
  }

  private load(): PersistedState {
    if (!fs.existsSync(this.filePath)) {
      console.log(`[storage] No state file at ${this.filePath}, starting empty`);
      return emptyState();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      this.quarantine(`unreadable (${err instanceof Error ? err.message : String(err)})`);
      return emptyState();
    }

    if (!isRecord(raw) || raw.version !== STATE_VERSION) {
      const version = isRecord(raw) ? String(raw.version) : "none";
      this.quarantine(`unsupported version ${version}`);
      return emptyState();
    }

    const state = this.parse(raw);
    console.log(
      `[storage] Loaded ${state.bindings.size} binding(s), ${state.sessions.size} session(s)`,
    );
    return state;
  }

  private parse(raw: Record<string, unknown>): PersistedState {
    const warn = (msg: string) => console.warn(`[storage] ${msg}`);
    const bindings = isRecord(raw.bindings) ? Object.entries(raw.bindings) : [];
    const sessions = isRecord(raw.sessions) ? Object.entries(raw.sessions) : [];
    return {
      bindings: parseRecords("binding", bindings, bindingSchema, warn),
      sessions: parseRecords("session", sessions, sessionSchema, warn),
    };
  }

  /**
   * Pick up records another process wrote since our last read or write.
   * A file that cannot be read back leaves the in-memory document as it is.
   */
  private refresh(): void {
    const current = fingerprint(this.filePath);
    if (current === null || current === this.seen) return;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      console.warn(`[storage] Could not re-read ${this.filePath}, keeping in-memory state:`, err);
      return;
    }
    if (!isRecord(raw) || raw.version !== STATE_VERSION) {
      console.warn(`[storage] ${this.filePath} changed to an unsupported format, keeping in-memory state`);
      return;
    }

    this.adopt(this.parse(raw));
    this.seen = current;
    console.log(`[storage] Reloaded ${this.filePath} after an external change`);
  }

  private async mutate<T>(
    operation: string,
    select: (doc: StateFile) => Record<string, T>,
    key: string,
    value: T | undefined,
  ): Promise<void> {
    await persist(operation, () => {
      if (!this.opened) throw new Error("storage is not open");

      this.refresh();
      const table = select(this.doc);
      const had = Object.hasOwn(table, key);
      const previous = table[key];
      if (value === undefined) {
        delete table[key];
      } else {
        table[key] = value;
      }

      try {
        this.writeAtomic();
      } catch (err) {
        if (had) {
          table[key] = previous;
        } else {
          delete table[key];
        }
        throw err;
      }
    });
  }

  private writeAtomic(): void {
    const tmp = `${this.filePath}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(this.doc, null, 2) + "\n", "utf-8");
    fs.renameSync(tmp, this.filePath);
    this.seen = fingerprint(this.filePath);
  }
}
