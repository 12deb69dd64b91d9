/**
 * Shutdown Manager
 *
 * Registry for cleanup functions run on SIGTERM/SIGINT, with a hard
 * force-exit backstop so the process never hangs on a stuck close.
 *
 *   onShutdown(() => bootstrap.close());
 */

import { createLogger } from "../lib/logger.js";

const log = createLogger("shutdown");

const FORCE_EXIT_MS = 5_000;

type CleanupFn = () => void | Promise<void>;

const cleanups: CleanupFn[] = [];
let shutdownStarted = false;

export function onShutdown(fn: CleanupFn): void {
  cleanups.push(fn);
}

/**
 * Run registered cleanups in registration order.
 * Only the first call does any work; later calls resolve to false.
 */
export async function runCleanups(): Promise<boolean> {
  if (shutdownStarted) return false;
  shutdownStarted = true;

  for (const fn of cleanups) {
    try {
      await fn();
    } catch (error) {
      // One failed cleanup must not block the rest
      log.warn("Cleanup failed", { error: error instanceof Error ? error.message : String(error) });
    }
  }
  return true;
}

export async function shutdown(code = 0): Promise<void> {
  const forceTimer = setTimeout(() => process.exit(code), FORCE_EXIT_MS);
  forceTimer.unref();

  const first = await runCleanups();
  if (first) process.exit(code);
}

export function installSignalHandlers(): void {
  const handle = (): void => {
    void shutdown(0);
  };
  process.on("SIGTERM", handle);
  process.on("SIGINT", handle);
}

/** Test hook */
export function resetShutdownState(): void {
  cleanups.length = 0;
  shutdownStarted = false;
}
