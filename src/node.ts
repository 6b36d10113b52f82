// ---------------------------------------------------------------------------
// Node.js HTTP server entrypoint (for deployment).
// ---------------------------------------------------------------------------

import { serve } from "@hono/node-server";
import { loadConfig } from "./config/config.js";
import { buildApp } from "./app.js";

const config = loadConfig();
const { app, shelf, logger } = buildApp(config);

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  logger.info({ port: info.port, env: config.env }, "genre-shelf listening");
});

function shutdown(signal: string): void {
  logger.info({ signal }, "shutting down");
  server.close();
  shelf.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, "failed to release fetcher");
      process.exit(1);
    },
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
