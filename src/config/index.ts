/**
 * Configuration Loader
 *
 * Loads and validates bridge-store configuration from environment variables.
 * Uses Zod for runtime validation so a bad value fails at startup.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors.js";

export const DEFAULT_STORE_PATH = "store/bridge.db";
export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const ConfigSchema = z.object({
  databaseUrl: z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    }),
  storePath: z.string().min(1).default(DEFAULT_STORE_PATH),
  probeTimeoutMs: z.coerce.number().int().positive().max(60_000).default(DEFAULT_PROBE_TIMEOUT_MS),
  hideDbUser: booleanFlag,
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  httpPort: z.coerce.number().int().min(0).max(65535).default(8080),
});

export type BridgeConfig = z.infer<typeof ConfigSchema>;

export type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

/**
 * Load configuration from environment variables
 *
 * Environment variables:
 * - DATABASE_URL: postgres:// or postgresql:// URL (optional, SQLite otherwise)
 * - BRIDGE_STORE_PATH: local SQLite file (default: store/bridge.db)
 * - BRIDGE_PROBE_TIMEOUT_MS: connection probe bound (default: 5000)
 * - BRIDGE_HIDE_DB_USER: also mask the user name in status output
 * - BRIDGE_LOG_LEVEL: debug | info | warn | error
 * - BRIDGE_HTTP_PORT: status server port (default: 8080)
 */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const raw = {
    databaseUrl: env.DATABASE_URL,
    storePath: nonEmpty(env.BRIDGE_STORE_PATH),
    probeTimeoutMs: nonEmpty(env.BRIDGE_PROBE_TIMEOUT_MS),
    hideDbUser: nonEmpty(env.BRIDGE_HIDE_DB_USER)?.toLowerCase(),
    logLevel: nonEmpty(env.BRIDGE_LOG_LEVEL)?.toLowerCase(),
    httpPort: nonEmpty(env.BRIDGE_HTTP_PORT),
  };

  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigurationError(`Invalid bridge-store configuration: ${issues.join("; ")}`, { issues });
  }

  return result.data;
}
