/**
 * Connection-level reliability settings for the local store
 */
import type Database from "better-sqlite3";

export const BUSY_TIMEOUT_MS = 5000;

export function applyReliabilityPragmas(db: Database.Database): void {
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");
  db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
  db.pragma("synchronous = NORMAL");
}
