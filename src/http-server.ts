/**
 * Status HTTP server
 *
 * Serves the storage status routes under /api on BRIDGE_HTTP_PORT.
 */

import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import type { StorageBootstrap } from "./database/bootstrap.js";
import { createLogger } from "./lib/logger.js";
import { statusRoutes } from "./web/routes/status.js";

const log = createLogger("http-server");

/**
 * Create the Hono app. Takes the bootstrap so tests can mount it directly.
 */
export function createApp(bootstrap: StorageBootstrap): Hono {
  const app = new Hono();

  app.route("/api", statusRoutes(bootstrap));

  app.notFound((c) => c.json({ error: "Not found", hint: "Available endpoints: /api/health, /api/storage" }, 404));

  app.onError((error, c) => {
    log.error("Unhandled error", { error: error.message, path: c.req.path });
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}

export function startStatusServer(bootstrap: StorageBootstrap, port: number): ServerType {
  const server = serve({ fetch: createApp(bootstrap).fetch, port }, (info) => {
    log.info("Status server listening", { port: info.port });
  });
  return server;
}
