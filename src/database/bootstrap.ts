/**
 * Storage bootstrap state machine
 *
 *   unconfigured → probing_remote → schema_reconciling → ready
 *                        ↓
 *                  probing_local → ready | fatal
 *
 * The phase is a discriminated union owned by one StorageBootstrap
 * instance; nothing here lives in module state. Remote is probed at most
 * once. Any remote failure moves to the local store for the rest of the
 * process lifetime.
 */

import { DEFAULT_STORE_PATH, type Env } from "../config/index.js";
import { createLogger } from "../lib/logger.js";
import { ConfigurationError, ConnectivityError, errorMessage } from "../utils/errors.js";
import type { DatabaseAdapter } from "./adapter.js";
import { resolveDatabaseConfig, resolveLocalConfig } from "./config-resolver.js";
import { reportConnectionInfo } from "./connection-info.js";
import { testConnection } from "./connection-tester.js";
import { redactConnectionUrl } from "./connection-url.js";
import { defaultDrivers, type DriverSet } from "./drivers.js";
import { reconcileSchema } from "./schema/reconciler.js";
import { SCHEMA_COLUMN_REQUIREMENTS } from "./schema/requirements.js";
import { createStore } from "./store-factory.js";
import type {
  ConnectionInfo,
  ConnectionProbeResult,
  DatabaseConfig,
  InitReport,
  ProbeAttempt,
  SchemaColumnRequirement,
} from "./types.js";

const log = createLogger("storage-bootstrap");

export type StoragePhase =
  | { status: "unconfigured" }
  | { status: "probing_remote"; config: DatabaseConfig }
  | { status: "probing_local"; config: DatabaseConfig; remoteFailure: string | null }
  | { status: "schema_reconciling"; config: DatabaseConfig; handle: DatabaseAdapter }
  | { status: "ready"; config: DatabaseConfig; handle: DatabaseAdapter; report: InitReport }
  | { status: "fatal"; error: Error };

export type PhaseStatus = StoragePhase["status"];

export interface StorageInitResult {
  handle: DatabaseAdapter;
  config: DatabaseConfig;
  report: InitReport;
}

export interface BootstrapOptions {
  env?: Env;
  storePath?: string;
  probeTimeoutMs?: number;
  hideDbUser?: boolean;
  drivers?: DriverSet;
  requirements?: readonly SchemaColumnRequirement[];
}

function describeFailure(probe: ConnectionProbeResult): string {
  if (probe.errorDetail) return probe.errorDetail;
  return probe.timedOut ? "timed out" : "unreachable";
}

function redactTarget(config: DatabaseConfig): string {
  return config.driverKind === "remote" ? redactConnectionUrl(config.connectionAddress) : config.connectionAddress;
}

export class StorageBootstrap {
  private phase: StoragePhase = { status: "unconfigured" };
  private readonly history: PhaseStatus[] = ["unconfigured"];
  private inflight: Promise<StorageInitResult> | null = null;
  private readonly env: Env;
  private readonly storePath: string;
  private readonly drivers: DriverSet;

  constructor(private readonly options: BootstrapOptions = {}) {
    this.env = options.env ?? process.env;
    this.storePath = options.storePath ?? DEFAULT_STORE_PATH;
    this.drivers = options.drivers ?? defaultDrivers;
  }

  getPhase(): StoragePhase {
    return this.phase;
  }

  /** Every phase entered so far, in order */
  getTransitions(): readonly PhaseStatus[] {
    return this.history;
  }

  getReport(): InitReport | null {
    return this.phase.status === "ready" ? this.phase.report : null;
  }

  /**
   * Recomputed on each call from the active config, so it follows a
   * fallback. Before ready it reports the uninitialized state.
   */
  getConnectionInfo(): ConnectionInfo {
    const config = this.phase.status === "ready" ? this.phase.config : null;
    return reportConnectionInfo(config, { hideUser: this.options.hideDbUser });
  }

  /**
   * Run initialization once. Concurrent callers share the same attempt;
   * later callers get the settled outcome.
   */
  initialize(): Promise<StorageInitResult> {
    if (this.phase.status === "ready") {
      const { handle, config, report } = this.phase;
      return Promise.resolve({ handle, config, report });
    }
    if (this.phase.status === "fatal") {
      return Promise.reject(this.phase.error);
    }
    if (!this.inflight) {
      this.inflight = this.run().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /**
   * Close the handle and return to unconfigured. No-op unless ready.
   */
  async close(): Promise<void> {
    if (this.phase.status !== "ready") return;
    const { handle } = this.phase;
    this.transition({ status: "unconfigured" });
    await handle.close();
  }

  private transition(next: StoragePhase): void {
    log.debug("Phase transition", { from: this.phase.status, to: next.status });
    this.phase = next;
    this.history.push(next.status);
  }

  private async probe(config: DatabaseConfig, attempts: ProbeAttempt[]): Promise<ConnectionProbeResult> {
    const result = await testConnection(config, {
      timeoutMs: this.options.probeTimeoutMs,
      drivers: this.drivers,
    });
    attempts.push({ driverKind: config.driverKind, target: redactTarget(config), result });
    return result;
  }

  private ready(config: DatabaseConfig, handle: DatabaseAdapter, report: InitReport): StorageInitResult {
    this.transition({ status: "ready", config, handle, report });
    log.info("Storage ready", {
      backend: config.driverKind,
      target: redactTarget(config),
      fellBack: report.fallbackReason !== null,
      durationMs: report.durationMs,
    });
    return { handle, config, report };
  }

  private async run(): Promise<StorageInitResult> {
    const start = performance.now();
    const attempts: ProbeAttempt[] = [];
    const elapsed = (): number => Math.round(performance.now() - start);

    try {
      const first = resolveDatabaseConfig(this.env, { storePath: this.storePath });
      let remoteFailure: string | null = null;

      if (first.driverKind === "remote") {
        this.transition({ status: "probing_remote", config: first });
        const probe = await this.probe(first, attempts);

        if (probe.reachable && probe.expectedSchemaPresent) {
          const handle = await createStore(first, { drivers: this.drivers });
          this.transition({ status: "schema_reconciling", config: first, handle });
          const schema = await reconcileSchema(handle, this.options.requirements ?? SCHEMA_COLUMN_REQUIREMENTS);
          return this.ready(first, handle, { attempts, fallbackReason: null, schema, durationMs: elapsed() });
        }

        remoteFailure = describeFailure(probe);
        log.warn("Remote database unavailable, falling back to local store", {
          target: redactTarget(first),
          reason: remoteFailure,
        });
      }

      const local = this.resolveFallbackConfig(remoteFailure);
      this.transition({ status: "probing_local", config: local, remoteFailure });
      const probe = await this.probe(local, attempts);

      if (!probe.reachable) {
        const localFailure = describeFailure(probe);
        const message =
          remoteFailure === null
            ? `Local store unavailable: ${localFailure}`
            : `No storage backend available. Remote: ${remoteFailure}. Local: ${localFailure}`;
        throw new ConnectivityError(message, remoteFailure, localFailure);
      }

      const handle = await createStore(local, { drivers: this.drivers });
      return this.ready(local, handle, {
        attempts,
        fallbackReason: remoteFailure,
        schema: null,
        durationMs: elapsed(),
      });
    } catch (error) {
      const fatal = error instanceof Error ? error : new Error(errorMessage(error));
      await this.releaseHalfOpen();
      this.transition({ status: "fatal", error: fatal });
      log.error("Storage initialization failed", { error: fatal.message, name: fatal.name });
      throw fatal;
    }
  }

  /**
   * Local config for the second leg. After a remote failure, a directory
   * error still carries the remote cause.
   */
  private resolveFallbackConfig(remoteFailure: string | null): DatabaseConfig {
    try {
      return resolveLocalConfig({ storePath: this.storePath });
    } catch (error) {
      if (remoteFailure === null || !(error instanceof ConfigurationError)) throw error;
      throw new ConfigurationError(`${error.message}. Remote: ${remoteFailure}`, {
        ...error.context,
        remoteError: remoteFailure,
      });
    }
  }

  /** A handle created before a later step threw must not leak */
  private async releaseHalfOpen(): Promise<void> {
    if (this.phase.status !== "schema_reconciling") return;
    try {
      await this.phase.handle.close();
    } catch (error) {
      log.warn("Failed to close handle after initialization error", { error: errorMessage(error) });
    }
  }
}

/**
 * Convenience for process entry points.
 */
export async function initializeStorage(
  options: BootstrapOptions = {},
): Promise<{ bootstrap: StorageBootstrap; result: StorageInitResult }> {
  const bootstrap = new StorageBootstrap(options);
  const result = await bootstrap.initialize();
  return { bootstrap, result };
}
