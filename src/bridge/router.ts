/**
 * Message router: inbound chat event → (project, branch, session) → agent
 * turn → chunked reply in the session's thread.
 *
 * Concurrency:
 * - thread creation for a channel message runs under a per-message key, so
 *   a redelivered event never opens a second thread;
 * - session creation is first-writer-wins per thread (SessionTable);
 * - turns for one thread are serialized; different threads run in parallel.
 *
 * `handle()` never throws: every failure becomes a RouteOutcome, and the
 * user-facing ones are reported in the originating channel or thread.
 */

import type { AgentRunner, TurnResult } from "../agent/types.ts";
import { BridgeError, isBridgeError, toError, type BridgeErrorCode } from "../errors.ts";
import { hasBranchOverride, parseBranchOverride } from "../mapping/branch.ts";
import { resolveChannelContext, type ChannelContext, type ContextOptions } from "../mapping/context.ts";
import type { BindingStore } from "../state/binding-store.ts";
import { KeyedQueue } from "../state/keyed-queue.ts";
import { acceptsTurns, type SessionTable } from "../state/session-table.ts";
import type { Session, SessionMode } from "../state/types.ts";
import { formatOverflow, type OverflowPolicy } from "./overflow.ts";
import { ProgressReporter } from "./progress.ts";
import type { ChatSurface, InboundEvent, RouteOutcome, TurnCanceller } from "./types.ts";

export interface RouterOptions extends ContextOptions {
  sessionMode: SessionMode;
  overflowPolicy: OverflowPolicy;
  messageLimit: number;
  turnTimeoutMs: number;
  progressIntervalMs: number;
}

export interface RouterDeps {
  bindings: BindingStore;
  sessions: SessionTable;
  surface: ChatSurface;
  agent: AgentRunner;
  options: RouterOptions;
}

const USER_FACING: ReadonlySet<BridgeErrorCode> = new Set([
  "UnboundChannel",
  "InvalidBranchName",
  "InvalidContext",
  "UnknownProject",
  "NothingToCancel",
  "PersistenceFailure",
]);

const THREAD_NAME_MAX = 90;

export const CANCELLED_NOTICE = "_Cancelled._";
export const EMPTY_OUTPUT_NOTICE = "_(no output)_";

export const UNBOUND_MESSAGE =
  "This channel isn't bound to a project. Use `/bind <project> [branch]` to set it up.";

/** Thread title from the first line of the prompt. */
export function threadName(prompt: string, branch: string): string {
  const firstLine = prompt
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .find((line) => line.length > 0);
  if (!firstLine) return `${branch} session`;
  if (firstLine.length <= THREAD_NAME_MAX) return firstLine;
  return firstLine.slice(0, THREAD_NAME_MAX - 1).trimEnd() + "…";
}

export function closedNotice(session: Session): string {
  const restart = "Post in the channel to start a new conversation.";
  switch (session.status) {
    case "cancelled":
      return `This conversation was cancelled. ${restart}`;
    case "failed":
      return `This conversation ended with an error. ${restart}`;
    case "completed":
      return `Conversations here are one-shot. ${restart}`;
    default:
      return `This conversation is busy (${session.status}).`;
  }
}

/** Reject with the signal's reason once it aborts. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(toError(signal.reason));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

export class MessageRouter implements TurnCanceller {
  private readonly bindings: BindingStore;
  private readonly sessions: SessionTable;
  private readonly surface: ChatSurface;
  private readonly agent: AgentRunner;
  private readonly options: RouterOptions;

  private readonly threadStarts = new KeyedQueue();
  private readonly turns = new KeyedQueue();
  private readonly controllers = new Map<string, AbortController>();

  constructor(deps: RouterDeps) {
    this.bindings = deps.bindings;
    this.sessions = deps.sessions;
    this.surface = deps.surface;
    this.agent = deps.agent;
    this.options = deps.options;
  }

  async handle(event: InboundEvent): Promise<RouteOutcome> {
    try {
      return await this.route(event);
    } catch (err) {
      const target = event.threadId ?? event.channelId;

      if (isBridgeError(err) && USER_FACING.has(err.code)) {
        console.log(`[router] ${err.code} for message ${event.messageId}: ${err.message}`);
        await this.report(target, err.message);
        return { kind: "rejected", code: err.code, message: err.message };
      }

      const error = toError(err);
      console.error(`[router] Failed to handle message ${event.messageId}:`, error);
      await this.report(target, `Something went wrong: ${error.message}`);
      return { kind: "error", message: error.message };
    }
  }

  /** Signal an in-flight turn to stop. Returns whether one was running. */
  abortTurn(threadId: string): boolean {
    const controller = this.controllers.get(threadId);
    if (!controller) return false;
    controller.abort(new Error("Cancelled"));
    return true;
  }

  /** Threads with a turn running or queued. */
  get activeThreadCount(): number {
    return this.turns.pendingKeyCount;
  }

  /** Resolves once every queued turn has settled. */
  drain(): Promise<void> {
    return this.turns.onIdle();
  }

  private async route(event: InboundEvent): Promise<RouteOutcome> {
    const text = event.text.trim();
    if (!text) return { kind: "ignored", reason: "empty" };

    if (event.isThread) {
      if (hasBranchOverride(text)) {
        throw new BridgeError(
          "InvalidContext",
          "`@branch` overrides only work in a channel message, not inside a thread. " +
            "Post in the channel to start a conversation on another branch.",
        );
      }
      const threadId = event.threadId;
      if (!threadId) {
        throw new BridgeError("InvalidContext", "Thread message arrived without a thread ID.");
      }
      const session = this.sessions.get(threadId) ?? (await this.adoptThread(event, threadId));
      return this.enqueueTurn(session.threadId, text);
    }

    const override = parseBranchOverride(text);
    const context = this.resolveContext(event, override?.branch);
    const prompt = override ? override.remainder : text;
    if (!prompt) return { kind: "ignored", reason: "empty" };

    const session = await this.startThread(event, context, prompt);
    if (!session) return { kind: "ignored", reason: "duplicate" };

    return this.enqueueTurn(session.threadId, prompt);
  }

  private resolveContext(event: InboundEvent, override: string | undefined): ChannelContext {
    const context = resolveChannelContext(
      { channelName: event.channelName, categoryName: event.categoryName },
      this.bindings.get(event.channelId),
      override,
      this.options,
    );
    if (!context) throw new BridgeError("UnboundChannel", UNBOUND_MESSAGE);
    return context;
  }

  /** New thread for a channel message; null when the message already has one. */
  private startThread(
    event: InboundEvent,
    context: ChannelContext,
    prompt: string,
  ): Promise<Session | null> {
    return this.threadStarts.run(event.messageId, async () => {
      if (this.sessions.findBySourceMessage(event.messageId)) {
        console.log(`[router] Message ${event.messageId} already has a thread, skipping`);
        return null;
      }

      const threadId = await this.surface.createThread(
        event.channelId,
        threadName(prompt, context.branch),
        event.messageId,
      );
      console.log(
        `[router] Thread ${threadId} for ${context.projectId}@${context.branch} ` +
          `(project from ${context.projectSource}, branch from ${context.branchSource})`,
      );

      return this.sessions.findOrCreate(threadId, {
        channelId: event.channelId,
        projectId: context.projectId,
        branch: context.branch,
        mode: this.options.sessionMode,
        sourceMessageId: event.messageId,
      });
    });
  }

  /** Bind a thread the bridge did not open to its parent channel's context. */
  private adoptThread(event: InboundEvent, threadId: string): Promise<Session> {
    const context = this.resolveContext(event, undefined);
    return this.sessions.findOrCreate(threadId, {
      channelId: event.channelId,
      projectId: context.projectId,
      branch: context.branch,
      mode: this.options.sessionMode,
    });
  }

  private enqueueTurn(threadId: string, text: string): Promise<RouteOutcome> {
    return this.turns.run(threadId, () => this.runTurn(threadId, text));
  }

  private async runTurn(threadId: string, text: string): Promise<RouteOutcome> {
    const session = this.sessions.get(threadId);
    if (!session) return { kind: "ignored", reason: "stale" };

    if (!acceptsTurns(session)) {
      await this.surface.sendMessage(threadId, closedNotice(session));
      return { kind: "ignored", reason: "session-closed" };
    }

    const started = await this.sessions.update(threadId, { kind: "start" });
    if (!started.ok) return { kind: "ignored", reason: "stale" };

    // Registered before the placeholder is posted, so /cancel reaches the turn from here on.
    const controller = new AbortController();
    this.controllers.set(threadId, controller);

    const progress = new ProgressReporter(this.surface, threadId, {
      limit: this.options.messageLimit,
      intervalMs: this.options.progressIntervalMs,
      placeholder: `_Working on \`${session.projectId}\` @ \`${session.branch}\`…_`,
    });

    try {
      await progress.start();
      const result = await this.callAgent(started.session, text, progress, controller);
      return await this.settleTurn(threadId, result, progress);
    } catch (err) {
      // Still running means the closing update never landed; release the thread.
      const error = toError(err);
      if (!(await this.sessions.abandon(threadId, error.message))) throw err;
      console.error(`[router] Turn in ${threadId} could not be closed: ${error.message}`);
      await progress.finish(`⚠️ ${error.message}`);
      return { kind: "failed", threadId, error: error.message };
    } finally {
      progress.stop();
      this.controllers.delete(threadId);
    }
  }

  private async settleTurn(
    threadId: string,
    result: TurnResult,
    progress: ProgressReporter,
  ): Promise<RouteOutcome> {
    if (this.isCancelled(threadId)) {
      await progress.finish(CANCELLED_NOTICE);
      return { kind: "cancelled", threadId };
    }

    if (result.status === "failed") {
      const failed = await this.sessions.update(threadId, { kind: "fail", error: result.error });
      if (!failed.ok) {
        await progress.finish(CANCELLED_NOTICE);
        return { kind: "cancelled", threadId };
      }
      console.warn(`[router] Turn failed in ${threadId}: ${result.error}`);
      await progress.finish(`⚠️ Agent failed: ${result.error}`);
      return { kind: "failed", threadId, error: result.error };
    }

    const completed = await this.sessions.update(threadId, {
      kind: "complete",
      resumeToken: result.resumeToken,
    });
    if (!completed.ok) {
      // Cancelled between the agent's answer and this update.
      await progress.finish(CANCELLED_NOTICE);
      return { kind: "cancelled", threadId };
    }

    const chunks = formatOverflow(result.output, this.options.overflowPolicy, this.options.messageLimit);
    if (chunks.length === 0) {
      await progress.finish(EMPTY_OUTPUT_NOTICE);
      return { kind: "completed", threadId, chunks: 1 };
    }

    const sent = await progress.deliver(chunks);
    return { kind: "completed", threadId, chunks: sent };
  }

  private async callAgent(
    session: Session,
    text: string,
    progress: ProgressReporter,
    controller: AbortController,
  ): Promise<TurnResult> {
    const { threadId } = session;
    if (controller.signal.aborted || this.isCancelled(threadId)) {
      return { status: "failed", error: "Cancelled" };
    }

    const seconds = Math.round(this.options.turnTimeoutMs / 1000);
    const timer = setTimeout(() => {
      controller.abort(new BridgeError("AgentFailure", `Agent turn timed out after ${seconds}s`));
    }, this.options.turnTimeoutMs);

    try {
      return await raceAbort(
        this.agent.runTurn({
          projectId: session.projectId,
          branch: session.branch,
          resumeToken: session.mode === "chat" ? session.resumeToken : undefined,
          text,
          signal: controller.signal,
          onProgress: (delta) => {
            if (this.isCancelled(threadId)) {
              progress.stop();
              return;
            }
            progress.push(delta);
          },
        }),
        controller.signal,
      );
    } catch (err) {
      return { status: "failed", error: toError(err).message };
    } finally {
      clearTimeout(timer);
    }
  }

  private isCancelled(threadId: string): boolean {
    return this.sessions.get(threadId)?.status === "cancelled";
  }

  private async report(targetId: string, text: string): Promise<void> {
    try {
      await this.surface.sendMessage(targetId, text);
    } catch (err) {
      console.error(`[router] Could not report to ${targetId}:`, err);
    }
  }
}
