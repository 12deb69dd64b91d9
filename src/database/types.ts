/**
 * Storage bootstrap types
 */

import type { SchemaDriftWarning } from "../utils/errors.js";
import type { DriverKind } from "./adapter.js";

export type { DriverKind } from "./adapter.js";

/** One connection attempt's target. Local addresses are plain paths. */
export interface DatabaseConfig {
  readonly driverKind: DriverKind;
  readonly connectionAddress: string;
  readonly migrationsLocation: string;
}

export interface ConnectionProbeResult {
  reachable: boolean;
  expectedSchemaPresent: boolean;
  errorDetail?: string;
  latencyMs: number;
  timedOut: boolean;
}

export interface SchemaColumnRequirement {
  table: string;
  column: string;
  sqlType: string;
  /** SQL expression, or null for no DEFAULT clause */
  defaultExpression: string | null;
  /** Requirement list version that introduced this column */
  since: number;
}

export interface ReconcileReport {
  applied: string[];
  alreadyPresent: string[];
  failed: SchemaDriftWarning[];
}

export interface ProbeAttempt {
  driverKind: DriverKind;
  /** Redacted address, safe to log */
  target: string;
  result: ConnectionProbeResult;
}

export interface InitReport {
  attempts: ProbeAttempt[];
  /** Why remote was abandoned, when it was */
  fallbackReason: string | null;
  /** Null when the local backend was used */
  schema: ReconcileReport | null;
  durationMs: number;
}

export type ConnectionInfo =
  | { status: "uninitialized" }
  | {
      status: "active";
      backendKind: "remote";
      isRemote: true;
      driver: "postgres";
      hostRedacted: string;
      storagePathOrNone: null;
      migrationsLocation: string;
      host: string | null;
      port: number | null;
      user: string | null;
      database: string | null;
    }
  | {
      status: "active";
      backendKind: "local";
      isRemote: false;
      driver: "sqlite3";
      hostRedacted: null;
      storagePathOrNone: string;
      migrationsLocation: string;
    };
