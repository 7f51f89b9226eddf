import type { Command } from "commander";
import chalk from "chalk";
import { loadProjectRegistry } from "../agent/projects.ts";
import { BridgeError, toError } from "../errors.ts";
import { validateBranchName } from "../mapping/branch.ts";
import { requireConfig, withStores } from "./state.ts";

function fail(err: unknown): never {
  console.error(chalk.red(toError(err).message));
  process.exit(1);
}

export function registerBindingCommands(program: Command): void {
  program
    .command("bindings")
    .description("List channel bindings")
    .action(async () => {
      const config = requireConfig();
      const bindings = await withStores(config, (stores) => stores.bindings.list());

      if (bindings.length === 0) {
        console.log(chalk.dim("No bindings"));
        return;
      }

      console.log(chalk.bold("\nBindings:\n"));
      for (const b of bindings) {
        const branch = b.branch ? chalk.green(b.branch) : chalk.dim("(channel name)");
        const date = new Date(b.boundAt).toLocaleString();
        console.log(`  ${chalk.cyan(b.channelId)}  ${b.projectId}  ${branch}  ${chalk.dim(date)}`);
      }
    });

  program
    .command("bind <channelId> <project> [branch]")
    .description("Bind a channel to a project, optionally pinning a branch")
    .action(async (channelId: string, project: string, branch: string | undefined) => {
      const config = requireConfig();
      try {
        if (branch !== undefined) validateBranchName(branch);
        const projects = loadProjectRegistry(config.projectsFile);
        if (!(await projects.projectExists(project))) {
          throw new BridgeError("UnknownProject", `Unknown project \`${project}\`.`);
        }
        await withStores(config, (stores) => stores.bindings.set(channelId, project, branch));
      } catch (err) {
        fail(err);
      }
      const pinned = branch ? ` on branch ${branch}` : "";
      console.log(chalk.green(`Bound ${channelId} to ${project}${pinned}`));
      console.log(chalk.dim("A running bridge picks this up on its next start."));
    });

  program
    .command("unbind <channelId>")
    .description("Remove a channel's binding")
    .action(async (channelId: string) => {
      const config = requireConfig();
      let existed = false;
      try {
        existed = await withStores(config, (stores) => stores.bindings.delete(channelId));
      } catch (err) {
        fail(err);
      }
      console.log(existed ? chalk.green(`Unbound ${channelId}`) : chalk.dim(`${channelId} had no binding`));
    });
}
