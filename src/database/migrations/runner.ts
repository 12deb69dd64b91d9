/**
 * Migration Runner: version tracking via PRAGMA user_version, one
 * transaction per migration.
 */
import type Database from "better-sqlite3";
import { createLogger } from "../../lib/logger.js";
import { ContextError, err, errorMessage, ok, type Result } from "../../utils/errors.js";
import type { Migration, MigrationResult, MigrationState } from "./types.js";
import { MIGRATIONS } from "./versions.js";

const log = createLogger("migrations");

export function getSchemaVersion(db: Database.Database): number {
  const version = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

export function setSchemaVersion(db: Database.Database, version: number): void {
  db.pragma(`user_version = ${Math.trunc(version)}`);
}

export function getLatestVersion(migrations: readonly Migration[] = MIGRATIONS): number {
  return migrations.reduce((max, m) => Math.max(max, m.version), 0);
}

export function getPendingMigrations(db: Database.Database, migrations: readonly Migration[] = MIGRATIONS): Migration[] {
  const currentVersion = getSchemaVersion(db);
  return migrations.filter((m) => m.version > currentVersion).sort((a, b) => a.version - b.version);
}

function applyMigration(db: Database.Database, migration: Migration, dbPath: string): Result<MigrationResult> {
  const startTime = Date.now();
  log.debug("Applying migration", { dbPath, version: migration.version, name: migration.name });

  const apply = db.transaction(() => {
    db.exec(migration.up);

    if (migration.validate && !migration.validate(db)) {
      throw new Error(`Migration validation failed for ${migration.name}`);
    }

    setSchemaVersion(db, migration.version);
    db.prepare("INSERT OR REPLACE INTO _migration_history (version, name, duration_ms) VALUES (?, ?, ?)").run(
      migration.version,
      migration.name,
      Date.now() - startTime,
    );
  });

  try {
    apply.immediate();
  } catch (error) {
    const message = errorMessage(error);
    log.error("Migration failed", { dbPath, version: migration.version, name: migration.name, error: message });

    return err(
      new ContextError(`Migration ${migration.version} (${migration.name}) failed: ${message}`, "DB_QUERY_ERROR", {
        version: migration.version,
        name: migration.name,
      }),
    );
  }

  const duration = Date.now() - startTime;
  log.info("Migration applied", { dbPath, version: migration.version, name: migration.name, duration_ms: duration });

  return ok({
    version: migration.version,
    name: migration.name,
    status: "applied",
    duration_ms: duration,
  });
}

export function runMigrations(
  db: Database.Database,
  dbPath: string = "unknown",
  migrations: readonly Migration[] = MIGRATIONS,
): Result<MigrationState> {
  const pending = getPendingMigrations(db, migrations);
  const results: MigrationResult[] = [];

  for (const migration of pending) {
    const result = applyMigration(db, migration, dbPath);

    if (!result.ok) {
      return err(result.error);
    }

    results.push(result.value);
  }

  return ok({
    current_version: getSchemaVersion(db),
    latest_version: getLatestVersion(migrations),
    pending_count: 0,
    applied: results,
  });
}
