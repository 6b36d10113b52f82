// ---------------------------------------------------------------------------
// Enrichment run routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { GenreShelf } from "../../genre-shelf.js";
import type { AppEnv } from "../env.js";
import { DirectoryBodySchema, parseInput } from "../validation.js";

export interface RunRouteDeps {
  shelf: GenreShelf;
}

/**
 * - `POST /runs` -- Process every unmarked book in `{ directory }` and
 *   return the run summary. Answers once the run has finished.
 */
export function runRoutes(deps: RunRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // POST /runs
  app.post("/", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const { directory } = parseInput(DirectoryBodySchema, body);

    c.get("logger").info({ directory }, "run requested");
    const summary = await deps.shelf.process(directory);
    return c.json(summary);
  });

  return app;
}
