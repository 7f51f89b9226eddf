/**
 * Per-key FIFO task queue with serialized processing.
 *
 * Tasks for the same key run one at a time, in arrival order; tasks for
 * different keys run concurrently. Used as the per-key mutual exclusion
 * behind session creation, thread creation and agent turns.
 */

interface QueueEntry {
  run: () => Promise<void>;
}

export class KeyedQueue {
  private queues = new Map<string, QueueEntry[]>();
  private processing = new Set<string>();
  private drained: Array<() => void> = [];

  /**
   * Enqueue a task under `key`. Resolves or rejects with the task's own
   * outcome; a failing task does not stop the ones queued behind it.
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let queue = this.queues.get(key);
      if (!queue) {
        queue = [];
        this.queues.set(key, queue);
      }

      queue.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (err) {
            reject(err);
          }
        },
      });

      if (!this.processing.has(key)) {
        void this.processQueue(key);
      }
    });
  }

  /** Number of keys with running or pending tasks. */
  get pendingKeyCount(): number {
    return this.queues.size;
  }

  /** Resolves once every queue is empty. */
  onIdle(): Promise<void> {
    if (this.queues.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.drained.push(resolve));
  }

  private async processQueue(key: string): Promise<void> {
    if (this.processing.has(key)) return;
    this.processing.add(key);

    try {
      while (true) {
        const queue = this.queues.get(key);
        const entry = queue?.shift();
        if (!entry) {
          this.queues.delete(key);
          break;
        }
        // Entries settle their own promise and never throw.
        await entry.run();
      }
    } finally {
      this.processing.delete(key);
      if (this.queues.size === 0) {
        const waiters = this.drained;
        this.drained = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
