/**
 * Connection info reporting.
 *
 * Pure transforms from the active DatabaseConfig to a redacted summary and
 * to the snake_case payload the status surface serves.
 */

import { parseConnectionUrl, redactParsedUrl, SECRET_MASK, type RedactOptions } from "./connection-url.js";
import type { ConnectionInfo, DatabaseConfig } from "./types.js";

export function reportConnectionInfo(config: DatabaseConfig | null, options: RedactOptions = {}): ConnectionInfo {
  if (config === null) {
    return { status: "uninitialized" };
  }

  if (config.driverKind === "local") {
    return {
      status: "active",
      backendKind: "local",
      isRemote: false,
      driver: "sqlite3",
      hostRedacted: null,
      storagePathOrNone: config.connectionAddress,
      migrationsLocation: config.migrationsLocation,
    };
  }

  const parsed = parseConnectionUrl(config.connectionAddress);
  if (!parsed.ok) {
    return {
      status: "active",
      backendKind: "remote",
      isRemote: true,
      driver: "postgres",
      hostRedacted: SECRET_MASK,
      storagePathOrNone: null,
      migrationsLocation: config.migrationsLocation,
      host: null,
      port: null,
      user: null,
      database: null,
    };
  }

  const url = parsed.value;
  return {
    status: "active",
    backendKind: "remote",
    isRemote: true,
    driver: "postgres",
    hostRedacted: redactParsedUrl(url, options),
    storagePathOrNone: null,
    migrationsLocation: config.migrationsLocation,
    host: url.host,
    port: url.port,
    user: options.hideUser ? null : url.user,
    database: url.database,
  };
}

export interface ActiveStatusPayload {
  type: "remote" | "local";
  is_remote: boolean;
  initialized: true;
  driver: string;
  migrations_path: string;
  path?: string;
  url?: string;
  host?: string;
  port?: number;
  user?: string;
  database?: string;
}

export type StatusPayload = { type: "uninitialized"; is_remote: false; initialized: false } | ActiveStatusPayload;

export function toStatusPayload(info: ConnectionInfo): StatusPayload {
  if (info.status === "uninitialized") {
    return { type: "uninitialized", is_remote: false, initialized: false };
  }

  if (info.backendKind === "local") {
    return {
      type: "local",
      is_remote: false,
      initialized: true,
      driver: info.driver,
      migrations_path: info.migrationsLocation,
      path: info.storagePathOrNone,
    };
  }

  const payload: ActiveStatusPayload = {
    type: "remote",
    is_remote: true,
    initialized: true,
    driver: info.driver,
    migrations_path: info.migrationsLocation,
    url: info.hostRedacted,
  };
  if (info.host !== null) payload.host = info.host;
  if (info.port !== null) payload.port = info.port;
  if (info.user !== null) payload.user = info.user;
  if (info.database !== null) payload.database = info.database;
  return payload;
}
