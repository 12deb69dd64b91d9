/**
 * Store factory: allocates the long-lived storage handle.
 *
 * Remote: a pooled postgres client. Local: a better-sqlite3 file with
 * reliability pragmas and the device-store migrations applied.
 */

import { createLogger } from "../lib/logger.js";
import { errorMessage, StoreCreationError } from "../utils/errors.js";
import { silentCatch } from "../utils/silent-catch.js";
import type { DatabaseAdapter } from "./adapter.js";
import type { PostgresPoolOptions } from "./adapters/postgres.js";
import { defaultDrivers, type DriverSet, type LocalHandle } from "./drivers.js";
import { applyReliabilityPragmas, checkIntegrity, runMigrations } from "./migrations/index.js";
import type { DatabaseConfig } from "./types.js";

const log = createLogger("store-factory");

export interface StoreOptions {
  drivers?: DriverSet;
  pool?: PostgresPoolOptions;
}

async function createLocalStore(config: DatabaseConfig, drivers: DriverSet): Promise<DatabaseAdapter> {
  const path = config.connectionAddress;
  let handle: LocalHandle;

  try {
    handle = await drivers.openLocal(path);
  } catch (error) {
    throw new StoreCreationError(`Failed to open local store at ${path}: ${errorMessage(error)}`, { path });
  }

  try {
    applyReliabilityPragmas(handle.db);

    const migrated = runMigrations(handle.db, path);
    if (!migrated.ok) {
      throw migrated.error;
    }
    if (migrated.value.applied.length > 0) {
      log.info("Local store schema upgraded", {
        path,
        version: migrated.value.current_version,
        applied: migrated.value.applied.map((m) => m.name),
      });
    }

    const integrity = checkIntegrity(handle.db);
    if (!integrity.valid) {
      throw new Error(integrity.issues.join("; "));
    }
  } catch (error) {
    await handle.adapter.close().catch(silentCatch("store:local-close"));
    throw new StoreCreationError(`Local store at ${path} is unusable: ${errorMessage(error)}`, { path });
  }

  return handle.adapter;
}

async function createRemoteStore(
  config: DatabaseConfig,
  drivers: DriverSet,
  pool: PostgresPoolOptions | undefined,
): Promise<DatabaseAdapter> {
  try {
    return await drivers.openRemote(config.connectionAddress, pool);
  } catch (error) {
    throw new StoreCreationError(`Failed to create remote store: ${errorMessage(error)}`);
  }
}

export async function createStore(config: DatabaseConfig, options: StoreOptions = {}): Promise<DatabaseAdapter> {
  const drivers = options.drivers ?? defaultDrivers;

  if (config.driverKind === "remote") {
    return createRemoteStore(config, drivers, options.pool);
  }
  return createLocalStore(config, drivers);
}
