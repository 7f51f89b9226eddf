/**
 * Shared types between the router, the command handlers and the chat
 * platform adapter.
 */

import type { BridgeErrorCode } from "../errors.ts";

// ── Inbound events (platform → router) ──

export interface InboundEvent {
  /** Platform message ID */
  messageId: string;
  /** Channel the message was posted in; for thread messages, the thread's parent channel */
  channelId: string;
  channelName: string;
  /** Category the channel sits under, if any */
  categoryName?: string;
  /** Set when the message was posted inside a thread */
  threadId?: string;
  isThread: boolean;
  author: { id: string; name: string };
  /** Message text with bot mentions removed */
  text: string;
}

// ── Outbound surface (router → platform) ──

export interface SendOptions {
  /** Attach a cancel button that maps to `/cancel` in the thread */
  cancellable?: boolean;
}

export interface ChatSurface {
  /** Send to a channel or thread. Returns the new message's ID. */
  sendMessage(targetId: string, text: string, options?: SendOptions): Promise<string>;

  /**
   * Create a thread in `channelId`. When `sourceMessageId` is given the
   * thread hangs off that message.
   */
  createThread(channelId: string, name: string, sourceMessageId?: string): Promise<string>;

  /** Replace a message's text (and drop its buttons). Optional. */
  editMessage?(targetId: string, messageId: string, text: string): Promise<void>;
}

// ── Router results ──

export type RouteOutcome =
  | { kind: "ignored"; reason: "empty" | "duplicate" | "session-closed" | "stale" }
  | { kind: "rejected"; code: BridgeErrorCode; message: string }
  | { kind: "completed"; threadId: string; chunks: number }
  | { kind: "cancelled"; threadId: string }
  | { kind: "failed"; threadId: string; error: string }
  | { kind: "error"; message: string };

/** Lets `/cancel` reach a turn that is in flight. */
export interface TurnCanceller {
  abortTurn(threadId: string): boolean;
}
