// ---------------------------------------------------------------------------
// Outcome listing routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { GenreShelf } from "../../genre-shelf.js";
import type { AppEnv } from "../env.js";
import { DirectoryQuerySchema, parseInput } from "../validation.js";

export interface OutcomeRouteDeps {
  shelf: GenreShelf;
}

/**
 * - `GET /outcomes?directory=` -- Every marker in the directory, decoded.
 */
export function outcomeRoutes(deps: OutcomeRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /outcomes
  app.get("/", async (c) => {
    const { directory } = parseInput(DirectoryQuerySchema, c.req.query());
    const outcomes = await deps.shelf.outcomesFor(directory);

    const payload = [...outcomes].map(([book, outcome]) => ({
      book,
      outcome: outcome.kind,
      genres: outcome.kind === "tagged" ? outcome.genres : [],
    }));

    return c.json({ directory, outcomes: payload, total: payload.length });
  });

  return app;
}
