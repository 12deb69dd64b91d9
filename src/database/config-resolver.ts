/**
 * Database config resolution.
 *
 * Decides from the environment which backend to try first. Remote configs
 * are validated here, before any connection is attempted.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { DEFAULT_STORE_PATH, type Env } from "../config/index.js";
import { createLogger } from "../lib/logger.js";
import { ConfigurationError, errorMessage } from "../utils/errors.js";
import { parseConnectionUrl } from "./connection-url.js";
import type { DatabaseConfig } from "./types.js";

const log = createLogger("config-resolver");

/** Where operators keep the remote schema; never executed by this package */
export const REMOTE_MIGRATIONS_LOCATION = "migrations/remote";
/** The embedded store creates its own tables at open time */
export const LOCAL_MIGRATIONS_LOCATION = "builtin:sqlite";

const STORE_DIR_MODE = 0o755;

export interface ResolveOptions {
  storePath?: string;
}

/**
 * Remote config when DATABASE_URL is set, local otherwise.
 * Throws ConfigurationError for an unsupported scheme or a malformed URL.
 */
export function resolveDatabaseConfig(env: Env = process.env, options: ResolveOptions = {}): DatabaseConfig {
  const url = env.DATABASE_URL?.trim();

  if (!url) {
    log.debug("DATABASE_URL not set, using local store");
    return resolveLocalConfig(options);
  }

  const parsed = parseConnectionUrl(url);
  if (!parsed.ok) {
    throw parsed.error;
  }

  return Object.freeze({
    driverKind: "remote",
    connectionAddress: url,
    migrationsLocation: REMOTE_MIGRATIONS_LOCATION,
  });
}

/**
 * Local config at the fixed store path. Creates the containing directory.
 */
export function resolveLocalConfig(options: ResolveOptions = {}): DatabaseConfig {
  const path = options.storePath ?? DEFAULT_STORE_PATH;
  const dir = dirname(path);

  try {
    mkdirSync(dir, { recursive: true, mode: STORE_DIR_MODE });
  } catch (error) {
    throw new ConfigurationError(`Cannot create local store directory ${dir}: ${errorMessage(error)}`, {
      dir,
    });
  }

  return Object.freeze({
    driverKind: "local",
    connectionAddress: path,
    migrationsLocation: LOCAL_MIGRATIONS_LOCATION,
  });
}
