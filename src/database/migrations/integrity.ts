/**
 * Local store integrity check
 */
import type Database from "better-sqlite3";
import { errorMessage } from "../../utils/errors.js";
import { getLatestVersion, getSchemaVersion } from "./runner.js";
import type { IntegrityCheck } from "./types.js";
import { LOCAL_TABLES } from "./versions.js";

export function checkIntegrity(db: Database.Database): IntegrityCheck {
  const version = getSchemaVersion(db);
  const issues: string[] = [];
  const tables: { name: string; exists: boolean }[] = [];

  try {
    const result = db.pragma("quick_check", { simple: true });
    if (result !== "ok") {
      issues.push(`SQLite quick check failed: ${String(result)}`);
    }
  } catch (error) {
    issues.push(`Failed to run quick check: ${errorMessage(error)}`);
  }

  const lookup = db.prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?");
  for (const table of LOCAL_TABLES) {
    const exists = lookup.get(table) !== undefined;
    tables.push({ name: table, exists });
    if (!exists) {
      issues.push(`Missing required table: ${table}`);
    }
  }

  if (version < getLatestVersion()) {
    issues.push(`Schema version ${version} is behind latest ${getLatestVersion()}`);
  }

  return {
    valid: issues.length === 0,
    version,
    issues,
    tables,
  };
}
