import process from "node:process";
import chalk from "chalk";
import { config } from "dotenv";
import { buildProgram } from "./cli/program.ts";
import { toError } from "./errors.ts";

// BRANCHLINE_* and DISCORD_* settings; .env.local wins over .env
config({ path: [".env.local", ".env"], quiet: true });

try {
  await buildProgram().parseAsync(process.argv);
} catch (err) {
  console.error(chalk.red(`branchline: ${toError(err).message}`));
  process.exitCode = 1;
}
