/**
 * Storage status routes
 *
 * GET /health   live ping of the storage handle (200 ok / 503 degraded)
 * GET /storage  redacted description of the active backend
 */

import { Hono } from "hono";
import type { StorageBootstrap } from "../../database/bootstrap.js";
import { toStatusPayload } from "../../database/connection-info.js";
import { checkStorageHealth } from "../../database/health.js";
import { REQUIREMENTS_VERSION } from "../../database/schema/requirements.js";

export function statusRoutes(bootstrap: StorageBootstrap): Hono {
  const status = new Hono();

  status.get("/health", async (c) => {
    const health = await checkStorageHealth(bootstrap);
    const code = health.connected ? 200 : 503;

    return c.json(
      {
        status: health.connected ? "ok" : "degraded",
        storage: health.connected ? "connected" : "unreachable",
        backend: health.mode,
        latency_ms: health.latencyMs,
      },
      code,
    );
  });

  status.get("/storage", (c) => {
    const payload = toStatusPayload(bootstrap.getConnectionInfo());
    const report = bootstrap.getReport();

    return c.json({
      ...payload,
      fallback_reason: report?.fallbackReason ?? null,
      schema: report?.schema
        ? {
            requirements_version: REQUIREMENTS_VERSION,
            applied: report.schema.applied,
            already_present: report.schema.alreadyPresent,
            drift: report.schema.failed.map((w) => ({ step: w.step, message: w.message })),
          }
        : null,
    });
  });

  return status;
}
