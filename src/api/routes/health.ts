// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { AppEnv } from "../env.js";

const startedAt = Date.now();

/**
 * Mounts health-check endpoints:
 *
 * - `GET /health` -- Basic liveness probe.
 */
export function healthRoutes(): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /health
  app.get("/", (c) => {
    return c.json({
      status: "ok",
      uptime: Date.now() - startedAt,
      timestamp: new Date().toISOString(),
    });
  });

  return app;
}
