import { logger } from "./logger";

/**
 * Registers shutdown handlers for SIGINT/SIGTERM.
 * Used by both the API and the worker process.
 */
export function onShutdown(fn: (signal: NodeJS.Signals) => Promise<void> | void) {
  const handler = async (signal: NodeJS.Signals) => {
    let exitCode = 0;
    try {
      await fn(signal);
    } catch (error) {
      logger.error({ signal, error }, "shutdown handler failed");
      exitCode = 1;
    } finally {
      process.exit(exitCode);
    }
  };

  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}
