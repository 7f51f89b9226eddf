import { KeyedQueue } from "./keyed-queue.ts";
import type { StateStorage } from "./storage.ts";
import type { Binding } from "./types.ts";

/**
 * Channel → (project, branch) bindings.
 *
 * Reads come from memory. Writes go to storage first and touch memory only
 * once the flush succeeded, so a failed write leaves the old binding live.
 * Writes to the same channel are serialized.
 */
export class BindingStore {
  private readonly bindings: Map<string, Binding>;
  private readonly storage: StateStorage;
  private readonly now: () => Date;
  private readonly writes = new KeyedQueue();

  constructor(storage: StateStorage, initial: Map<string, Binding>, now: () => Date = () => new Date()) {
    this.storage = storage;
    this.bindings = new Map(initial);
    this.now = now;
  }

  get(channelId: string): Binding | undefined {
    return this.bindings.get(channelId);
  }

  /** Last writer wins; the previous binding is replaced, not merged. */
  async set(channelId: string, projectId: string, branch?: string): Promise<Binding> {
    const binding: Binding = {
      channelId,
      projectId,
      ...(branch ? { branch } : {}),
      boundAt: this.now().toISOString(),
    };
    await this.writes.run(channelId, async () => {
      await this.storage.saveBinding(binding);
      this.bindings.set(channelId, binding);
    });
    console.log(
      `[bindings] ${channelId} → ${projectId}${branch ? ` (${branch})` : ""}`,
    );
    return binding;
  }

  /** Idempotent. Returns whether a binding existed. */
  async delete(channelId: string): Promise<boolean> {
    const existed = await this.writes.run(channelId, async () => {
      const had = this.bindings.has(channelId);
      await this.storage.deleteBinding(channelId);
      this.bindings.delete(channelId);
      return had;
    });
    if (existed) {
      console.log(`[bindings] ${channelId} unbound`);
    }
    return existed;
  }

  list(): Binding[] {
    return [...this.bindings.values()];
  }
}
