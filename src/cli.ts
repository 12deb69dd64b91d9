#!/usr/bin/env node
/**
 * bridge-store CLI entry point
 *
 * Resolves storage from the environment, prints the outcome, and serves
 * the status routes until signalled.
 *
 *   bridge-store           # initialize and serve /api/health, /api/storage
 *   bridge-store status    # initialize, print status, exit
 */

import { existsSync } from "node:fs";
import { loadConfig } from "./config/index.js";
import { StorageBootstrap } from "./database/bootstrap.js";
import { formatStorageStatus } from "./database/health.js";
import { startStatusServer } from "./http-server.js";
import { createLogger, setLogLevel } from "./lib/logger.js";
import { ContextError, errorMessage } from "./utils/errors.js";
import { installSignalHandlers, onShutdown } from "./utils/shutdown.js";

const log = createLogger("cli");

async function main(args: string[]): Promise<number | null> {
  if (existsSync(".env")) {
    process.loadEnvFile(".env");
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  const bootstrap = new StorageBootstrap({
    env: { DATABASE_URL: config.databaseUrl },
    storePath: config.storePath,
    probeTimeoutMs: config.probeTimeoutMs,
    hideDbUser: config.hideDbUser,
  });
  await bootstrap.initialize();
  process.stderr.write(`${formatStorageStatus(bootstrap)}\n`);

  if (args[0] === "status") {
    await bootstrap.close();
    return 0;
  }

  const server = startStatusServer(bootstrap, config.httpPort);
  onShutdown(
    () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
      }),
  );
  onShutdown(() => bootstrap.close());
  installSignalHandlers();
  return null;
}

main(process.argv.slice(2))
  .then((code) => {
    if (code !== null) process.exit(code);
  })
  .catch((error: unknown) => {
    if (error instanceof ContextError) {
      log.error("Startup failed", error.toJSON());
    } else {
      log.error("Startup failed", { error: errorMessage(error) });
    }
    process.stderr.write(`Error: ${errorMessage(error)}\n`);
    process.exit(1);
  });
