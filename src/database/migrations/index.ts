/**
 * Local store migration system: barrel export
 */
export type { Migration, MigrationResult, MigrationState, IntegrityCheck } from "./types.js";
export { MIGRATIONS, LOCAL_TABLES } from "./versions.js";
export {
  getSchemaVersion,
  getLatestVersion,
  getPendingMigrations,
  runMigrations,
} from "./runner.js";
export { checkIntegrity } from "./integrity.js";
export { applyReliabilityPragmas, BUSY_TIMEOUT_MS } from "./pragmas.js";
