/**
 * Agent runtime client backed by the Claude Agent SDK.
 *
 * The project's checkout is the working directory, the branch is stated in
 * the appended system prompt, and the SDK session ID serves as the resume
 * token. Text deltas from partial messages are reported as progress.
 */

import { query, type Options, type SDKMessage } from "@anthropic-ai/claude-agent-sdk";
import { toError } from "../errors.ts";
import type { ProjectRegistry } from "./projects.ts";
import type { AgentRunner, TurnRequest, TurnResult } from "./types.ts";

export interface ClaudeRunnerOptions {
  /** Model to use (SDK default when unset) */
  model?: string;
  /** Permission mode for tool use; the bridge runs unattended */
  permissionMode?: Options["permissionMode"];
  /** Maximum agent turns per chat message */
  maxTurns?: number;
}

export function branchPrompt(projectId: string, branch: string, defaultBranch?: string): string {
  const base = defaultBranch ? ` (create it from \`${defaultBranch}\` if it does not exist)` : "";
  return [
    `You are working on project \`${projectId}\`, git branch \`${branch}\`.`,
    `Make sure the working tree is on \`${branch}\`${base} before changing files.`,
    "Replies are posted to a chat thread: keep them concise and use Markdown.",
  ].join("\n");
}

function resultError(subtype: string): string {
  switch (subtype) {
    case "error_max_turns":
      return "The agent hit its turn limit before finishing.";
    case "error_during_execution":
      return "The agent stopped with an execution error.";
    default:
      return `The agent stopped: ${subtype}.`;
  }
}

export class ClaudeAgentRunner implements AgentRunner {
  private projects: ProjectRegistry;
  private options: ClaudeRunnerOptions;

  constructor(projects: ProjectRegistry, options: ClaudeRunnerOptions = {}) {
    this.projects = projects;
    this.options = options;
  }

  async runTurn(request: TurnRequest): Promise<TurnResult> {
    const project = this.projects.get(request.projectId);
    if (!project) {
      return { status: "failed", error: `Project \`${request.projectId}\` is not in the registry.` };
    }

    console.log(
      `[agent] Turn on ${project.id}@${request.branch}${request.resumeToken ? " (resumed)" : ""}`,
    );

    // The SDK takes a controller; mirror the router's signal into it.
    const abortController = new AbortController();
    const onAbort = () => abortController.abort(request.signal.reason);
    if (request.signal.aborted) onAbort();
    else request.signal.addEventListener("abort", onAbort, { once: true });

    try {
      const sdkQuery = query({
        prompt: request.text,
        options: {
          cwd: project.path,
          model: this.options.model,
          permissionMode: this.options.permissionMode ?? "acceptEdits",
          systemPrompt: {
            type: "preset",
            preset: "claude_code",
            append: branchPrompt(project.id, request.branch, project.defaultBranch),
          },
          resume: request.resumeToken,
          maxTurns: this.options.maxTurns ?? 50,
          includePartialMessages: true,
          abortController,
          env: {
            ...process.env,
            CLAUDE_AGENT_SDK_CLIENT_APP: "branchline/0.1.0",
          },
        },
      });

      return await this.collect(sdkQuery, request);
    } catch (err) {
      return { status: "failed", error: toError(err).message };
    } finally {
      request.signal.removeEventListener("abort", onAbort);
    }
  }

  private async collect(messages: AsyncIterable<SDKMessage>, request: TurnRequest): Promise<TurnResult> {
    let assistantText = "";
    let sessionId: string | undefined;

    for await (const msg of messages) {
      switch (msg.type) {
        case "system": {
          if (!sessionId) sessionId = msg.session_id;
          break;
        }

        case "stream_event": {
          const event = msg.event;
          if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
            request.onProgress?.(event.delta.text);
          }
          break;
        }

        case "assistant": {
          for (const block of msg.message.content) {
            if (block.type === "text" && block.text) {
              assistantText += (assistantText ? "\n\n" : "") + block.text;
            }
          }
          break;
        }

        case "result": {
          sessionId = msg.session_id;
          if (msg.subtype !== "success") {
            return { status: "failed", error: resultError(msg.subtype) };
          }
          if (msg.is_error) {
            return { status: "failed", error: msg.result || "The agent reported an error." };
          }
          return {
            status: "completed",
            output: msg.result || assistantText,
            resumeToken: sessionId,
          };
        }

        default:
          break;
      }
    }

    return { status: "failed", error: "The agent ended without a result." };
  }
}
