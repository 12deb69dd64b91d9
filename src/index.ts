/**
 * bridge-store: storage selection for the bridge device store.
 *
 * Picks PostgreSQL from DATABASE_URL or the embedded SQLite file, probes
 * it, falls back to local when the remote is unusable, and reports the
 * active backend with secrets masked.
 */

export {
  initializeStorage,
  StorageBootstrap,
  type BootstrapOptions,
  type PhaseStatus,
  type StorageInitResult,
  type StoragePhase,
} from "./database/bootstrap.js";
export {
  LOCAL_MIGRATIONS_LOCATION,
  REMOTE_MIGRATIONS_LOCATION,
  resolveDatabaseConfig,
  resolveLocalConfig,
} from "./database/config-resolver.js";
export { testConnection, type ProbeOptions } from "./database/connection-tester.js";
export { reconcileSchema } from "./database/schema/reconciler.js";
export { REQUIRED_TABLE, REQUIREMENTS_VERSION, SCHEMA_COLUMN_REQUIREMENTS } from "./database/schema/requirements.js";
export { createStore, type StoreOptions } from "./database/store-factory.js";
export { reportConnectionInfo, toStatusPayload, type StatusPayload } from "./database/connection-info.js";
export { parseConnectionUrl, redactConnectionUrl, SECRET_MASK } from "./database/connection-url.js";
export { checkStorageHealth, formatStorageStatus, type StorageHealth } from "./database/health.js";
export { defaultDrivers, type DriverSet, type LocalHandle } from "./database/drivers.js";
export type { DatabaseAdapter, DriverKind, QueryResult, Row, SqlParam } from "./database/adapter.js";
export type {
  ConnectionInfo,
  ConnectionProbeResult,
  DatabaseConfig,
  InitReport,
  ProbeAttempt,
  ReconcileReport,
  SchemaColumnRequirement,
} from "./database/types.js";
export { loadConfig, type BridgeConfig } from "./config/index.js";
export { createApp, startStatusServer } from "./http-server.js";
export {
  ConfigurationError,
  ConnectivityError,
  ContextError,
  StoreCreationError,
  type SchemaDriftWarning,
} from "./utils/errors.js";
