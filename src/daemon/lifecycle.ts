/**
 * Process lifecycle for the foreground bridge: signals trigger one
 * orderly shutdown, and stray errors are logged rather than lost.
 */

const SHUTDOWN_SIGNALS = ["SIGTERM", "SIGINT", "SIGHUP"] as const;

export function installSignalHandlers(onShutdown: () => Promise<void>): void {
  let stopping: Promise<void> | undefined;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    console.log(`[daemon] ${signal} received, stopping the bridge`);
    try {
      await onShutdown();
      process.exit(0);
    } catch (err) {
      console.error("[daemon] Shutdown did not complete cleanly:", err);
      process.exit(1);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      stopping ??= shutdown(signal);
    });
  }

  process.on("uncaughtException", (err) => {
    console.error("[daemon] Uncaught exception:", err);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    console.error("[daemon] Unhandled rejection:", reason);
  });
}

/** Resolves with `true` when `promise` settles first, `false` on timeout. */
export async function settleWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true as const), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
