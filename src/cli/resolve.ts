import type { Command } from "commander";
import chalk from "chalk";
import { loadEnvConfig } from "../config/env.ts";
import { classifyChannelName, parseBranchOverride, resolveBranch } from "../mapping/branch.ts";
import { toError } from "../errors.ts";

export function registerResolveCommand(program: Command): void {
  program
    .command("resolve <channelName> [message...]")
    .description("Show the branch a channel name (and optional `@branch` message) maps to")
    .action((channelName: string, message: string[]) => {
      const { mainBranch } = loadEnvConfig();
      const text = message.join(" ");
      const override = text ? parseBranchOverride(text) : null;

      try {
        const branch = resolveBranch(channelName, override?.branch, { mainBranch });
        const kind = override ? "override" : classifyChannelName(channelName, { mainBranch }).kind;
        console.log(`${chalk.cyan(`#${channelName}`)} → ${chalk.green(branch)} ${chalk.dim(`(${kind})`)}`);
      } catch (err) {
        console.error(chalk.red(toError(err).message));
        process.exitCode = 1;
      }
    });
}
