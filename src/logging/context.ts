// ---------------------------------------------------------------------------
// Request-scoped logging middleware for Hono.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type pino from "pino";
import type { AppEnv } from "../api/env.js";

/**
 * Attaches a child logger carrying `requestId`, `method` and `path` to
 * every request. Must run after the request-ID middleware.
 *
 * Downstream handlers access it via `c.get("logger")`.
 */
export function createRequestLogger(
  baseLogger: pino.Logger,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const childLogger = baseLogger.child({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
    });

    c.set("logger", childLogger);

    const start = Date.now();
    childLogger.debug("request started");

    await next();

    const durationMs = Date.now() - start;
    childLogger.info({ durationMs, status: c.res.status }, "request completed");
  };
}
