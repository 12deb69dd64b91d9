/**
 * Storage Health
 *
 * Live liveness check of the active handle plus a human-readable summary
 * for the CLI. Health is computed on demand, never stored.
 */

import { errorMessage } from "../utils/errors.js";
import { withTimeout } from "../utils/timers.js";
import type { StorageBootstrap } from "./bootstrap.js";
import type { InitReport } from "./types.js";

export const HEALTH_PING_TIMEOUT_MS = 2000;

export interface StorageHealth {
  mode: "remote" | "local" | "uninitialized";
  connected: boolean;
  latencyMs: number | null;
  error: string | null;
}

export async function checkStorageHealth(
  bootstrap: StorageBootstrap,
  timeoutMs: number = HEALTH_PING_TIMEOUT_MS,
): Promise<StorageHealth> {
  const phase = bootstrap.getPhase();
  if (phase.status !== "ready") {
    return { mode: "uninitialized", connected: false, latencyMs: null, error: `storage is ${phase.status}` };
  }

  const start = performance.now();
  try {
    await withTimeout(phase.handle.ping(), timeoutMs, "health ping");
    return {
      mode: phase.config.driverKind,
      connected: true,
      latencyMs: Math.round(performance.now() - start),
      error: null,
    };
  } catch (error) {
    return {
      mode: phase.config.driverKind,
      connected: false,
      latencyMs: Math.round(performance.now() - start),
      error: errorMessage(error),
    };
  }
}

/**
 * Format the bootstrap outcome for display
 */
export function formatStorageStatus(bootstrap: StorageBootstrap): string {
  const info = bootstrap.getConnectionInfo();
  if (info.status === "uninitialized") {
    return "Storage: not initialized";
  }

  const lines: string[] = [];
  if (info.backendKind === "remote") {
    lines.push("Mode: Remote (PostgreSQL)");
    lines.push(`URL: ${info.hostRedacted}`);
  } else {
    lines.push("Mode: Local (SQLite)");
    lines.push(`Path: ${info.storagePathOrNone}`);
  }
  lines.push(`Migrations: ${info.migrationsLocation}`);

  const report: InitReport | null = bootstrap.getReport();
  if (report?.fallbackReason) {
    lines.push(`Fallback: remote unavailable (${report.fallbackReason})`);
  }
  if (report?.schema) {
    const { applied, failed } = report.schema;
    if (applied.length > 0) lines.push(`Schema: added ${applied.join(", ")}`);
    for (const warning of failed) {
      lines.push(`Schema drift: ${warning.step}: ${warning.message}`);
    }
  }

  return lines.join("\n");
}
