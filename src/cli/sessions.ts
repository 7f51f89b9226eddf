import type { Command } from "commander";
import chalk from "chalk";
import type { Session, SessionStatus } from "../state/types.ts";
import { requireConfig, withStores } from "./state.ts";

const STATUSES: readonly SessionStatus[] = ["idle", "running", "cancelled", "completed", "failed"];

function parseStatus(value: string): SessionStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`--status must be one of ${STATUSES.join(", ")}`);
  }
  return status;
}

function colorStatus(status: SessionStatus): string {
  switch (status) {
    case "running":
      return chalk.yellow(status);
    case "completed":
      return chalk.green(status);
    case "failed":
      return chalk.red(status);
    default:
      return chalk.dim(status);
  }
}

export function formatSessionLine(s: Session): string {
  const date = new Date(s.updatedAt).toLocaleString();
  return `  ${chalk.cyan(s.threadId)}  ${colorStatus(s.status)}  ${s.projectId}@${s.branch}  ${chalk.dim(`${s.mode}, ${s.turns} turn(s)`)}  ${chalk.dim(date)}`;
}

export function registerSessionsCommand(program: Command): void {
  program
    .command("sessions")
    .description("List sessions, most recently updated first")
    .option("--status <status>", `Filter by status (${STATUSES.join(", ")})`, parseStatus)
    .option("--channel <channelId>", "Only sessions started from this channel")
    .action(async (options: { status?: SessionStatus; channel?: string }) => {
      const config = requireConfig();
      const sessions = await withStores(config, (stores) =>
        stores.sessions.list({ status: options.status, channelId: options.channel }),
      );

      if (sessions.length === 0) {
        console.log(chalk.dim("No sessions found"));
        return;
      }

      sessions.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
      console.log(chalk.bold("\nSessions:\n"));
      for (const s of sessions) {
        console.log(formatSessionLine(s));
        if (s.lastError) console.log(chalk.dim(`      ${s.lastError}`));
      }
    });
}
