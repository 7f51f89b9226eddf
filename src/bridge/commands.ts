/**
 * `/status`, `/bind`, `/unbind` and `/cancel`.
 *
 * Handlers return a reply instead of throwing; the platform adapter shows
 * it to the invoking user only.
 */

import type { ProjectDirectory } from "../agent/types.ts";
import { BridgeError, isBridgeError, toError, type BridgeErrorCode } from "../errors.ts";
import { validateBranchName } from "../mapping/branch.ts";
import { resolveChannelContext, type ContextOptions } from "../mapping/context.ts";
import type { BindingStore } from "../state/binding-store.ts";
import type { SessionTable } from "../state/session-table.ts";
import type { TurnCanceller } from "./types.ts";
import { UNBOUND_MESSAGE } from "./router.ts";

export type CommandInvocation =
  | { name: "status" }
  | { name: "bind"; project: string; branch?: string }
  | { name: "unbind" }
  | { name: "cancel" };

export interface CommandContext {
  /** Channel the command targets; inside a thread, the thread's parent */
  channelId: string;
  channelName: string;
  categoryName?: string;
  /** Set when invoked inside a thread */
  threadId?: string;
}

export interface CommandReply {
  ok: boolean;
  text: string;
  code?: BridgeErrorCode;
}

export interface CommandDeps {
  bindings: BindingStore;
  sessions: SessionTable;
  projects: ProjectDirectory;
  turns: TurnCanceller;
  options: ContextOptions;
}

export class CommandHandlers {
  private readonly bindings: BindingStore;
  private readonly sessions: SessionTable;
  private readonly projects: ProjectDirectory;
  private readonly turns: TurnCanceller;
  private readonly options: ContextOptions;

  constructor(deps: CommandDeps) {
    this.bindings = deps.bindings;
    this.sessions = deps.sessions;
    this.projects = deps.projects;
    this.turns = deps.turns;
    this.options = deps.options;
  }

  async execute(ctx: CommandContext, invocation: CommandInvocation): Promise<CommandReply> {
    try {
      switch (invocation.name) {
        case "status":
          return this.status(ctx);
        case "bind":
          return await this.bind(ctx, invocation.project, invocation.branch);
        case "unbind":
          return await this.unbind(ctx);
        case "cancel":
          return await this.cancel(ctx);
      }
    } catch (err) {
      if (isBridgeError(err)) {
        return { ok: false, code: err.code, text: err.message };
      }
      const error = toError(err);
      console.error(`[commands] /${invocation.name} failed in ${ctx.channelId}:`, error);
      return { ok: false, text: `Something went wrong: ${error.message}` };
    }
  }

  /** Read-only. */
  status(ctx: CommandContext): CommandReply {
    const binding = this.bindings.get(ctx.channelId);
    const context = resolveChannelContext(
      { channelName: ctx.channelName, categoryName: ctx.categoryName },
      binding,
      undefined,
      this.options,
    );

    if (!context) {
      return { ok: false, code: "UnboundChannel", text: UNBOUND_MESSAGE };
    }

    const lines = [
      "**Channel Status**",
      `- Project: \`${context.projectId}\` (from ${context.projectSource})`,
      `- Branch: \`${context.branch}\` (from ${context.branchSource})`,
    ];

    if (ctx.threadId) {
      const session = this.sessions.get(ctx.threadId);
      if (session) {
        lines.push(
          `- Session: ${session.status} (${session.mode}, ${session.turns} turn(s))`,
          `- Session branch: \`${session.branch}\``,
          `- Resumable: ${session.resumeToken ? "yes" : "no"}`,
          `- Started: ${session.createdAt}`,
        );
        if (session.lastError) lines.push(`- Last error: ${session.lastError}`);
      } else {
        lines.push("- Session: none in this thread");
      }
    } else {
      const running = this.sessions.list({ channelId: ctx.channelId, status: "running" });
      lines.push(`- Running sessions: ${running.length}`);
    }

    return { ok: true, text: lines.join("\n") };
  }

  async bind(ctx: CommandContext, project: string, branch?: string): Promise<CommandReply> {
    const projectId = project.trim();
    if (branch !== undefined) validateBranchName(branch);

    if (!projectId || !(await this.projects.projectExists(projectId))) {
      throw new BridgeError("UnknownProject", `Unknown project \`${projectId}\`.`);
    }

    await this.bindings.set(ctx.channelId, projectId, branch);
    const branchText = branch ? `branch \`${branch}\`` : "branch from the channel name";
    return { ok: true, text: `Bound channel to project \`${projectId}\`, ${branchText}.` };
  }

  /** Succeeds whether or not a binding existed. */
  async unbind(ctx: CommandContext): Promise<CommandReply> {
    const existed = await this.bindings.delete(ctx.channelId);
    return {
      ok: true,
      text: existed ? "Channel binding removed." : "Channel had no binding.",
    };
  }

  async cancel(ctx: CommandContext): Promise<CommandReply> {
    if (!ctx.threadId) {
      throw new BridgeError("InvalidContext", "`/cancel` only works inside a session thread.");
    }
    if (!(await this.sessions.cancel(ctx.threadId))) {
      throw new BridgeError("NothingToCancel", "Nothing to cancel in this thread.");
    }
    this.turns.abortTurn(ctx.threadId);
    return { ok: true, text: "Cancellation requested." };
  }
}
