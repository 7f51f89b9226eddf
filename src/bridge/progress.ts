/**
 * Progressive output for a running turn.
 *
 * Posts a placeholder in the thread, then throttles edits showing the tail
 * of the streamed text. The final chunks replace the placeholder (first
 * chunk) and follow it as new messages. On surfaces that cannot edit, no
 * placeholder is posted and only the final chunks are sent.
 */

import { tail } from "./overflow.ts";
import type { ChatSurface } from "./types.ts";

export interface ProgressOptions {
  /** Platform message size limit */
  limit: number;
  /** Minimum delay between placeholder edits */
  intervalMs: number;
  /** Placeholder text shown before any output streams in */
  placeholder: string;
}

export class ProgressReporter {
  private surface: ChatSurface;
  private threadId: string;
  private options: ProgressOptions;

  private messageId: string | undefined;
  private buffer = "";
  private lastSent = "";
  private timer: ReturnType<typeof setInterval> | null = null;
  private inflight: Promise<void> = Promise.resolve();
  private stopped = false;

  constructor(surface: ChatSurface, threadId: string, options: ProgressOptions) {
    this.surface = surface;
    this.threadId = threadId;
    this.options = options;
  }

  /** Post the placeholder. A failed post only disables live updates. */
  async start(): Promise<void> {
    if (!this.surface.editMessage) return;
    try {
      this.messageId = await this.surface.sendMessage(this.threadId, this.options.placeholder, {
        cancellable: true,
      });
    } catch (err) {
      console.warn(`[progress] Placeholder failed in ${this.threadId}:`, err);
    }
  }

  /** Pass as the runner's `onProgress` callback. */
  push = (delta: string): void => {
    if (this.stopped || !delta) return;
    this.buffer += delta;
    this.ensureTimer();
  };

  /** Stop live updates; later deltas are dropped. */
  stop(): void {
    this.stopped = true;
    this.stopTimer();
  }

  /** Deliver final chunks. Returns how many messages carry them. */
  async deliver(chunks: string[]): Promise<number> {
    this.stop();
    await this.inflight;

    let rest = chunks;
    const [first] = chunks;
    if (first !== undefined && (await this.editPlaceholder(first))) {
      rest = chunks.slice(1);
    }
    for (const chunk of rest) {
      await this.surface.sendMessage(this.threadId, chunk);
    }
    return chunks.length;
  }

  /** Replace the placeholder with a closing notice (cancelled, failed, empty). */
  async finish(text: string): Promise<void> {
    this.stop();
    await this.inflight;
    if (!(await this.editPlaceholder(text))) {
      await this.surface.sendMessage(this.threadId, text);
    }
  }

  private async editPlaceholder(text: string): Promise<boolean> {
    if (!this.messageId || !this.surface.editMessage) return false;
    try {
      await this.surface.editMessage(this.threadId, this.messageId, text);
      return true;
    } catch (err) {
      console.warn(`[progress] Final edit failed in ${this.threadId}, sending instead:`, err);
      return false;
    }
  }

  private ensureTimer(): void {
    if (this.timer || !this.messageId) return;
    this.timer = setInterval(() => this.flush(), this.options.intervalMs);
  }

  private stopTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private flush(): void {
    const edit = this.surface.editMessage;
    if (!this.messageId || !edit || this.stopped) return;

    const text = tail(this.buffer, this.options.limit);
    if (text === this.lastSent) return;
    this.lastSent = text;

    const messageId = this.messageId;
    this.inflight = this.inflight
      .then(() => edit.call(this.surface, this.threadId, messageId, text))
      .catch((err: unknown) => {
        // Rate-limited or failed: the next tick retries with newer text.
        console.warn(`[progress] Live update failed in ${this.threadId}:`, err);
      });
  }
}
