import os from "node:os";
import path from "node:path";
import process from "node:process";
import type { OverflowPolicy } from "../bridge/overflow.ts";
import type { SessionMode } from "../state/types.ts";

export type StateBackend = "file" | "postgres";

export interface BridgeConfig {
  /** Discord bot token */
  discordToken?: string;
  /** Guild to register slash commands in (global when unset) */
  guildId?: string;
  /** Base directory for state and project files (default: ~/.branchline) */
  homeDir: string;
  /** Where bindings and sessions are stored */
  stateBackend: StateBackend;
  /** JSON state file (file backend) */
  statePath: string;
  /** PostgreSQL connection URL (postgres backend) */
  databaseUrl?: string;
  /** Project registry file */
  projectsFile: string;
  /** Project for unbound channels (unset = unbound channels are rejected) */
  defaultProject?: string;
  /** Session mode for new threads */
  sessionMode: SessionMode;
  /** What to do with replies over the message limit */
  overflowPolicy: OverflowPolicy;
  /** Platform message size limit in characters (Discord: 2000) */
  messageLimit: number;
  /** Branch that #main and #master map to */
  mainBranch: string;
  /** Only react to channel messages that mention the bot */
  requireMention: boolean;
  /** Use the channel's category name as project for unbound channels */
  inferProjectFromCategory: boolean;
  /** Thread auto-archive duration in minutes */
  threadArchiveMinutes: number;
  /** Upper bound for one agent turn */
  turnTimeoutMs: number;
  /** Minimum delay between progress edits */
  progressIntervalMs: number;
  /** Model passed to the agent runtime */
  model?: string;
}

const SESSION_MODES: readonly string[] = ["chat", "stateless"];
const OVERFLOW_POLICIES: readonly string[] = ["split", "trim"];
const STATE_BACKENDS: readonly string[] = ["file", "postgres"];
const ARCHIVE_DURATIONS = [60, 1440, 4320, 10080];

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : fallback;
}

function boolEnv(name: string): boolean {
  const raw = process.env[name]?.toLowerCase();
  return raw === "true" || raw === "1" || raw === "yes";
}

function optional(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

export function loadEnvConfig(): BridgeConfig {
  const homeDir = optional("BRANCHLINE_HOME") ?? path.join(os.homedir(), ".branchline");

  return {
    discordToken: optional("DISCORD_BOT_TOKEN"),
    guildId: optional("DISCORD_GUILD_ID"),
    homeDir,
    stateBackend: (optional("BRANCHLINE_STATE_BACKEND") ?? "file") as StateBackend,
    statePath: optional("BRANCHLINE_STATE_PATH") ?? path.join(homeDir, "state.json"),
    databaseUrl: optional("DATABASE_URL"),
    projectsFile: optional("BRANCHLINE_PROJECTS_FILE") ?? path.join(homeDir, "projects.json"),
    defaultProject: optional("BRANCHLINE_DEFAULT_PROJECT"),
    sessionMode: (optional("BRANCHLINE_SESSION_MODE") ?? "chat") as SessionMode,
    overflowPolicy: (optional("BRANCHLINE_OVERFLOW") ?? "split") as OverflowPolicy,
    messageLimit: intEnv("BRANCHLINE_MESSAGE_LIMIT", 2000),
    mainBranch: optional("BRANCHLINE_MAIN_BRANCH") ?? "main",
    requireMention: boolEnv("BRANCHLINE_REQUIRE_MENTION"),
    inferProjectFromCategory: boolEnv("BRANCHLINE_INFER_PROJECT"),
    threadArchiveMinutes: intEnv("BRANCHLINE_THREAD_ARCHIVE_MINUTES", 1440),
    turnTimeoutMs: intEnv("BRANCHLINE_TURN_TIMEOUT_MS", 600_000),
    progressIntervalMs: intEnv("BRANCHLINE_PROGRESS_INTERVAL_MS", 1500),
    model: optional("BRANCHLINE_MODEL"),
  };
}

/**
 * Problems that make the config unusable. `forBridge` adds the checks
 * that only matter when connecting to Discord.
 */
export function validateConfig(cfg: BridgeConfig, options: { forBridge?: boolean } = {}): string[] {
  const errors: string[] = [];

  if (!STATE_BACKENDS.includes(cfg.stateBackend)) {
    errors.push(`BRANCHLINE_STATE_BACKEND must be "file" or "postgres", got "${cfg.stateBackend}".`);
  }
  if (cfg.stateBackend === "postgres" && !cfg.databaseUrl) {
    errors.push("DATABASE_URL is required when BRANCHLINE_STATE_BACKEND is postgres.");
  }
  if (!SESSION_MODES.includes(cfg.sessionMode)) {
    errors.push(`BRANCHLINE_SESSION_MODE must be "chat" or "stateless", got "${cfg.sessionMode}".`);
  }
  if (!OVERFLOW_POLICIES.includes(cfg.overflowPolicy)) {
    errors.push(`BRANCHLINE_OVERFLOW must be "split" or "trim", got "${cfg.overflowPolicy}".`);
  }
  if (!Number.isInteger(cfg.messageLimit) || cfg.messageLimit < 100) {
    errors.push("BRANCHLINE_MESSAGE_LIMIT must be an integer of at least 100.");
  }
  if (!ARCHIVE_DURATIONS.includes(cfg.threadArchiveMinutes)) {
    errors.push(`BRANCHLINE_THREAD_ARCHIVE_MINUTES must be one of ${ARCHIVE_DURATIONS.join(", ")}.`);
  }
  if (!Number.isInteger(cfg.turnTimeoutMs) || cfg.turnTimeoutMs <= 0) {
    errors.push("BRANCHLINE_TURN_TIMEOUT_MS must be a positive integer.");
  }
  if (!Number.isInteger(cfg.progressIntervalMs) || cfg.progressIntervalMs <= 0) {
    errors.push("BRANCHLINE_PROGRESS_INTERVAL_MS must be a positive integer.");
  }
  if (options.forBridge && !cfg.discordToken) {
    errors.push("DISCORD_BOT_TOKEN is required to run the bridge.");
  }

  return errors;
}
