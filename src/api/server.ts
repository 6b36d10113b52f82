// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { GenreShelf } from "../genre-shelf.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { createErrorHandler } from "./middleware/error-handler.js";

import { healthRoutes } from "./routes/health.js";
import { runRoutes } from "./routes/runs.js";
import { outcomeRoutes } from "./routes/outcomes.js";
import { genreRoutes } from "./routes/genres.js";

export type { AppEnv } from "./env.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  shelf: GenreShelf;
  logger: pino.Logger;
  /** Return internal error messages in 500 responses. */
  exposeErrors: boolean;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      name: "genre-shelf",
      routes: ["/health", "/runs", "/outcomes", "/genres"],
    }),
  );

  app.route("/health", healthRoutes());
  app.route("/runs", runRoutes({ shelf: deps.shelf }));
  app.route("/outcomes", outcomeRoutes({ shelf: deps.shelf }));
  app.route("/genres", genreRoutes({ shelf: deps.shelf }));

  // ── Error handling ────────────────────────────────────────────────────

  app.notFound((c) => c.json({ error: "Not found", type: "not_found" }, 404));
  app.onError(createErrorHandler({ exposeErrors: deps.exposeErrors }));

  return app;
}
