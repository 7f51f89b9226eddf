import type { BridgeConfig } from "../config/env.ts";
import { BindingStore } from "./binding-store.ts";
import { JsonFileStorage } from "./json-file.ts";
import { PostgresStorage } from "./postgres.ts";
import { SessionTable } from "./session-table.ts";
import type { StateStorage } from "./storage.ts";

export interface Stores {
  storage: StateStorage;
  bindings: BindingStore;
  sessions: SessionTable;
}

export function createStorage(config: Pick<BridgeConfig, "stateBackend" | "statePath" | "databaseUrl">): StateStorage {
  if (config.stateBackend === "postgres") {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required for the postgres state backend");
    }
    return PostgresStorage.connect(config.databaseUrl);
  }
  return new JsonFileStorage(config.statePath);
}

/**
 * Load persisted state into the in-memory stores. Opening changes no
 * record, so the CLI can read state next to a running bridge.
 */
export async function openStores(storage: StateStorage, now: () => Date = () => new Date()): Promise<Stores> {
  const state = await storage.open();
  return {
    storage,
    bindings: new BindingStore(storage, state.bindings, now),
    sessions: new SessionTable(storage, state.sessions, now),
  };
}
