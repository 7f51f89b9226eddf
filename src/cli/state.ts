import chalk from "chalk";
import { loadEnvConfig, validateConfig, type BridgeConfig } from "../config/env.ts";
import { createStorage, openStores, type Stores } from "../state/open.ts";

/** Load and validate the environment config, exiting on problems. */
export function requireConfig(options: { forBridge?: boolean } = {}): BridgeConfig {
  const config = loadEnvConfig();
  const problems = validateConfig(config, options);
  if (problems.length > 0) {
    console.error(chalk.red("Configuration problems:"));
    for (const problem of problems) console.error(chalk.red(`  - ${problem}`));
    process.exit(1);
  }
  return config;
}

/**
 * Open the configured state, run `fn`, and close it again. Edits land in
 * the shared store at once; a running bridge carries them along on its own
 * writes and routes with them from its next start.
 */
export async function withStores<T>(config: BridgeConfig, fn: (stores: Stores) => Promise<T> | T): Promise<T> {
  const stores = await openStores(createStorage(config));
  try {
    return await fn(stores);
  } finally {
    await stores.storage.close();
  }
}
