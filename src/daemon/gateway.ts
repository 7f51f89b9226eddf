/**
 * Gateway: boots the bridge in order, wires the pieces together, and
 * handles graceful shutdown.
 *
 *   storage → binding store + session table → agent runner
 *     → router + command handlers → Discord adapter
 */

import { ClaudeAgentRunner } from "../agent/claude-runner.ts";
import { loadProjectRegistry, type ProjectRegistry } from "../agent/projects.ts";
import type { AgentRunner } from "../agent/types.ts";
import { CommandHandlers } from "../bridge/commands.ts";
import { MessageRouter, type RouterOptions } from "../bridge/router.ts";
import type { BridgeConfig } from "../config/env.ts";
import { DiscordAdapter } from "../discord/adapter.ts";
import { createStorage, openStores, type Stores } from "../state/open.ts";
import type { StateStorage } from "../state/storage.ts";
import { installSignalHandlers, settleWithin } from "./lifecycle.ts";

/** How long shutdown waits for running turns before closing storage. */
const DRAIN_TIMEOUT_MS = 10_000;

export interface GatewayOptions {
  /** Replace the configured storage driver */
  storage?: StateStorage;
  /** Replace the Claude Agent SDK runner */
  agent?: AgentRunner;
  /** Replace the projects file */
  projects?: ProjectRegistry;
  /** Leave process signals alone (tests, embedding) */
  skipSignalHandlers?: boolean;
}

export function routerOptions(config: BridgeConfig): RouterOptions {
  return {
    mainBranch: config.mainBranch,
    inferProjectFromCategory: config.inferProjectFromCategory,
    defaultProject: config.defaultProject,
    sessionMode: config.sessionMode,
    overflowPolicy: config.overflowPolicy,
    messageLimit: config.messageLimit,
    turnTimeoutMs: config.turnTimeoutMs,
    progressIntervalMs: config.progressIntervalMs,
  };
}

export class Gateway {
  private readonly config: BridgeConfig;
  private readonly options: GatewayOptions;
  private stores: Stores | null = null;
  private router: MessageRouter | null = null;
  private discord: DiscordAdapter | null = null;

  constructor(config: BridgeConfig, options: GatewayOptions = {}) {
    this.config = config;
    this.options = options;
  }

  async start(): Promise<void> {
    console.log("[gateway] Starting bridge...");

    if (!this.options.skipSignalHandlers) {
      installSignalHandlers(() => this.stop());
    }

    const token = this.config.discordToken;
    if (!token) throw new Error("DISCORD_BOT_TOKEN is not set");

    const stores = await openStores(this.options.storage ?? createStorage(this.config));
    this.stores = stores;
    await stores.sessions.settleInterrupted();

    const projects = this.options.projects ?? loadProjectRegistry(this.config.projectsFile);
    const agent = this.options.agent ?? new ClaudeAgentRunner(projects, { model: this.config.model });
    const options = routerOptions(this.config);

    const discord: DiscordAdapter = new DiscordAdapter(
      {
        token,
        guildId: this.config.guildId,
        requireMention: this.config.requireMention,
        threadArchiveMinutes: this.config.threadArchiveMinutes,
      },
      {
        onMessage: (event) => router.handle(event),
        onCommand: (ctx, invocation) => commands.execute(ctx, invocation),
      },
    );

    const router: MessageRouter = new MessageRouter({
      bindings: stores.bindings,
      sessions: stores.sessions,
      surface: discord,
      agent,
      options,
    });

    const commands = new CommandHandlers({
      bindings: stores.bindings,
      sessions: stores.sessions,
      projects,
      turns: router,
      options,
    });

    this.router = router;
    this.discord = discord;

    await discord.start();

    console.log("[gateway] Bridge is running");
    console.log(`[gateway]   State: ${this.config.stateBackend} (${stores.storage.description})`);
    console.log(`[gateway]   Projects: ${projects.list().length}`);
    console.log(`[gateway]   Sessions: ${options.sessionMode}, overflow: ${options.overflowPolicy}`);
  }

  /** Stop the bridge gracefully. */
  async stop(): Promise<void> {
    console.log("[gateway] Stopping bridge...");

    // Running turns still post their replies; new events are dropped.
    this.discord?.pause();

    if (this.router && this.router.activeThreadCount > 0) {
      console.log(`[gateway] Waiting for ${this.router.activeThreadCount} running turn(s)...`);
      const drained = await settleWithin(this.router.drain(), DRAIN_TIMEOUT_MS);
      if (!drained) console.warn("[gateway] Turns still running after timeout, closing anyway");
    }

    await this.discord?.stop();

    await this.stores?.storage.close();
    this.stores = null;
    this.router = null;
    this.discord = null;

    console.log("[gateway] Bridge stopped");
  }
}
