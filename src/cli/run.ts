/**
 * `branchline run`: start the bridge in the foreground. Stop it with
 * Ctrl-C or SIGTERM.
 */

import type { Command } from "commander";
import chalk from "chalk";
import { Gateway } from "../daemon/gateway.ts";
import { requireConfig } from "./state.ts";

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Connect to Discord and run the bridge in the foreground")
    .action(async () => {
      const config = requireConfig({ forBridge: true });
      const gateway = new Gateway(config);
      try {
        await gateway.start();
      } catch (err) {
        console.error(chalk.red(`Failed to start: ${err instanceof Error ? err.message : String(err)}`));
        await gateway.stop();
        process.exit(1);
      }
      // Keep the process alive; the signal handlers shut it down.
    });
}
