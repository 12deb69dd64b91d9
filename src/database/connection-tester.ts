/**
 * Connection probing.
 *
 * Opens a short-lived connection, pings it, and for remote backends checks
 * the catalog for the table the device store needs. Failures come back as a
 * negative ConnectionProbeResult; nothing here throws.
 */

import { DEFAULT_PROBE_TIMEOUT_MS } from "../config/index.js";
import { createLogger } from "../lib/logger.js";
import { errorMessage } from "../utils/errors.js";
import { silentCatch } from "../utils/silent-catch.js";
import { TimeoutError, withTimeout } from "../utils/timers.js";
import type { DatabaseAdapter } from "./adapter.js";
import { defaultDrivers, type DriverSet } from "./drivers.js";
import { REQUIRED_TABLE } from "./schema/requirements.js";
import type { ConnectionProbeResult, DatabaseConfig } from "./types.js";

const log = createLogger("connection-tester");

/** Upper bound on waiting for a probe connection to close */
const CLOSE_GRACE_MS = 1000;

export const TABLE_EXISTS_SQL =
  "SELECT COUNT(*) AS count FROM information_schema.tables WHERE table_schema = current_schema() AND table_name = $1";

export interface ProbeOptions {
  timeoutMs?: number;
  requiredTable?: string;
  drivers?: DriverSet;
}

interface ProbeSession {
  adapter: DatabaseAdapter | null;
  abandoned: boolean;
}

async function openProbeConnection(
  config: DatabaseConfig,
  drivers: DriverSet,
  timeoutMs: number,
): Promise<DatabaseAdapter> {
  if (config.driverKind === "remote") {
    return drivers.openRemote(config.connectionAddress, {
      max: 1,
      idleTimeout: 0,
      connectTimeout: Math.max(1, Math.ceil(timeoutMs / 1000)),
    });
  }
  const local = await drivers.openLocal(config.connectionAddress);
  return local.adapter;
}

async function runProbe(
  config: DatabaseConfig,
  session: ProbeSession,
  drivers: DriverSet,
  timeoutMs: number,
  requiredTable: string,
): Promise<boolean> {
  const adapter = await openProbeConnection(config, drivers, timeoutMs);
  if (session.abandoned) {
    // Deadline passed while opening; nobody else will close this one
    await adapter.close();
    throw new Error("probe abandoned");
  }
  session.adapter = adapter;

  await adapter.ping();

  if (config.driverKind === "local") {
    return true;
  }

  const row = await adapter.get<{ count: number | string | bigint }>(TABLE_EXISTS_SQL, [requiredTable]);
  return Number(row?.count ?? 0) > 0;
}

async function release(session: ProbeSession): Promise<void> {
  const adapter = session.adapter;
  session.adapter = null;
  if (adapter) {
    await withTimeout(adapter.close(), CLOSE_GRACE_MS, "probe close").catch(silentCatch("probe:close"));
  }
}

export async function testConnection(
  config: DatabaseConfig,
  options: ProbeOptions = {},
): Promise<ConnectionProbeResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const requiredTable = options.requiredTable ?? REQUIRED_TABLE;
  const drivers = options.drivers ?? defaultDrivers;
  const session: ProbeSession = { adapter: null, abandoned: false };
  const start = performance.now();

  const pending = runProbe(config, session, drivers, timeoutMs, requiredTable);

  try {
    const schemaPresent = await withTimeout(pending, timeoutMs, `${config.driverKind} probe`);
    const latencyMs = Math.round(performance.now() - start);

    if (!schemaPresent) {
      return {
        reachable: true,
        expectedSchemaPresent: false,
        errorDetail: `required table "${requiredTable}" not found; apply the migrations in ${config.migrationsLocation} first`,
        latencyMs,
        timedOut: false,
      };
    }

    log.debug("Probe succeeded", { driver: config.driverKind, latencyMs });
    return { reachable: true, expectedSchemaPresent: true, latencyMs, timedOut: false };
  } catch (error) {
    return {
      reachable: false,
      expectedSchemaPresent: false,
      errorDetail: errorMessage(error),
      latencyMs: Math.round(performance.now() - start),
      timedOut: error instanceof TimeoutError,
    };
  } finally {
    session.abandoned = true;
    void pending.catch(silentCatch("probe:pending"));
    await release(session);
  }
}
