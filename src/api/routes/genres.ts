// ---------------------------------------------------------------------------
// Genre browsing and library operation routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { GenreShelf } from "../../genre-shelf.js";
import type { AppEnv } from "../env.js";
import {
  DeleteQuerySchema,
  DirectoryBodySchema,
  DirectoryQuerySchema,
  GenreParamSchema,
  GenresQuerySchema,
  parseInput,
} from "../validation.js";

export interface GenreRouteDeps {
  shelf: GenreShelf;
}

/**
 * Mounts genre endpoints:
 *
 * - `GET    /genres?directory=&filter=`          -- Ranked genres.
 * - `GET    /genres/:genre/books?directory=`     -- Books filed under a genre.
 * - `POST   /genres/:genre/move` `{ directory }` -- Move them into a genre folder.
 * - `DELETE /genres/:genre?directory=&confirm=`  -- Delete them; only with `confirm=true`.
 */
export function genreRoutes(deps: GenreRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // GET /genres
  app.get("/", async (c) => {
    const { directory, filter } = parseInput(GenresQuerySchema, c.req.query());
    const index = await deps.shelf.index(directory);

    const genres = index
      .filter(filter ?? "")
      .map(({ genre, count }) => ({ genre, count }));

    return c.json({ directory, genres, total: genres.length });
  });

  // GET /genres/:genre/books
  app.get("/:genre/books", async (c) => {
    const genre = parseInput(GenreParamSchema, c.req.param("genre"));
    const { directory } = parseInput(DirectoryQuerySchema, c.req.query());
    const index = await deps.shelf.index(directory);
    const books = index.booksFor(genre);

    return c.json({ genre: genre.toLowerCase(), books, total: books.length });
  });

  // POST /genres/:genre/move
  app.post("/:genre/move", async (c) => {
    const genre = parseInput(GenreParamSchema, c.req.param("genre"));
    const body: unknown = await c.req.json().catch(() => undefined);
    const { directory } = parseInput(DirectoryBodySchema, body);

    const result = await deps.shelf.move(directory, genre);
    return c.json(result);
  });

  // DELETE /genres/:genre
  app.delete("/:genre", async (c) => {
    const genre = parseInput(GenreParamSchema, c.req.param("genre"));
    const { directory, confirm } = parseInput(DeleteQuerySchema, c.req.query());

    const result = await deps.shelf.delete(directory, genre, () => confirm);
    return c.json(result);
  });

  return app;
}
