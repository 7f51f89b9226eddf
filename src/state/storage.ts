/**
 * Durable storage behind the Binding Store and the Session Table.
 *
 * Drivers load the whole state once on `open()` and flush every mutation
 * before the returned promise resolves. Any driver failure surfaces as a
 * `PersistenceFailure`.
 */

import { z } from "zod/v4";
import { BridgeError, toError } from "../errors.ts";
import type { Binding, PersistedState, Session } from "./types.ts";

export interface StateStorage {
  /** Human-readable location, for logs */
  readonly description: string;

  open(): Promise<PersistedState>;
  saveBinding(binding: Binding): Promise<void>;
  deleteBinding(channelId: string): Promise<void>;
  saveSession(session: Session): Promise<void>;
  close(): Promise<void>;
}

export const bindingSchema = z.object({
  channelId: z.string().min(1),
  projectId: z.string().min(1),
  branch: z.string().min(1).optional(),
  boundAt: z.string(),
});

export const sessionSchema = z.object({
  threadId: z.string().min(1),
  channelId: z.string().min(1),
  projectId: z.string().min(1),
  branch: z.string().min(1),
  mode: z.enum(["chat", "stateless"]),
  resumeToken: z.string().min(1).optional(),
  status: z.enum(["idle", "running", "cancelled", "completed", "failed"]),
  createdAt: z.string(),
  updatedAt: z.string(),
  sourceMessageId: z.string().optional(),
  turns: z.number().int().nonnegative(),
  lastError: z.string().optional(),
});

export function emptyState(): PersistedState {
  return { bindings: new Map(), sessions: new Map() };
}

/**
 * Turns raw records into validated ones, dropping (and reporting) the
 * records that do not parse.
 */
export function parseRecords<T>(
  kind: string,
  raw: Iterable<[string, unknown]>,
  schema: z.ZodType<T>,
  warn: (message: string) => void,
): Map<string, T> {
  const records = new Map<string, T>();
  for (const [key, value] of raw) {
    const parsed = schema.safeParse(value);
    if (parsed.success) {
      records.set(key, parsed.data);
    } else {
      warn(`Dropping invalid ${kind} record "${key}": ${z.prettifyError(parsed.error)}`);
    }
  }
  return records;
}

export async function persist<T>(operation: string, fn: () => Promise<T> | T): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof BridgeError) throw err;
    const error = toError(err);
    throw new BridgeError("PersistenceFailure", `Could not ${operation}: ${error.message}`, {
      cause: error,
    });
  }
}
