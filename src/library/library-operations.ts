// ---------------------------------------------------------------------------
// Library operations – move or delete every book filed under a genre.
//
// Each book contributes its book file(s) and its marker, which move together
// under one name. Per-file failures are collected and the operation carries
// on; nothing is rolled back.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import type pino from "pino";

import type { ConfirmFn, DeleteResult, MoveResult } from "../core/types.js";
import { DirectoryScanError, LibraryOperationError } from "../core/errors.js";
import { MARKER_EXTENSION } from "../store/marker-store.js";
import { toBookFile } from "./book-scanner.js";
import type { GenreIndex } from "./genre-index.js";

/** Folder name for a genre: path separators and dot-only names are defused. */
export function genreFolderName(genre: string): string {
  const name = genre.trim().toLowerCase().replace(/[\\/]/g, "-");
  return /^\.*$/.test(name) ? name.replace(/\./g, "-") || "-" : name;
}

/** One book's files in the library directory: book file(s), then its marker. */
export interface BookFiles {
  baseName: string;
  files: string[];
}

/**
 * Files in `directory` that belong to the genre's books, grouped per book.
 * Extensions match case-insensitively, as the scanner matches them. Books
 * with no file left on disk are omitted.
 *
 * @throws DirectoryScanError when the directory cannot be read.
 */
export async function filesForGenre(
  directory: string,
  genre: string,
  index: GenreIndex,
  extensions: readonly string[],
): Promise<BookFiles[]> {
  const books = new Set(index.booksFor(genre));
  if (books.size === 0) return [];

  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const entries = await fs
    .readdir(directory, { withFileTypes: true })
    .catch((err: unknown) => {
      throw new DirectoryScanError(directory, { cause: err });
    });

  const byBook = new Map<string, { books: string[]; markers: string[] }>();
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    const file = toBookFile(directory, entry.name);
    if (!books.has(file.baseName)) continue;

    const isMarker = file.extension === MARKER_EXTENSION;
    if (!isMarker && !wanted.has(file.extension)) continue;

    const group = byBook.get(file.baseName) ?? { books: [], markers: [] };
    (isMarker ? group.markers : group.books).push(entry.name);
    byBook.set(file.baseName, group);
  }

  return index.booksFor(genre).flatMap((baseName) => {
    const group = byBook.get(baseName);
    if (!group) return [];
    return [{ baseName, files: [...group.books.sort(), ...group.markers.sort()] }];
  });
}

/**
 * First of `baseName`, `baseName_1`, `baseName_2`, … under which none of the
 * book's `files` exists in `targetDirectory`. A book and its marker always
 * land under the same name.
 */
export async function uniqueStem(
  targetDirectory: string,
  baseName: string,
  files: readonly string[],
): Promise<string> {
  const suffixes = files.map((name) => name.slice(baseName.length));
  let stem = baseName;
  for (let n = 1; await anyExists(targetDirectory, stem, suffixes); n++) {
    stem = `${baseName}_${n}`;
  }
  return stem;
}

// ── Move ────────────────────────────────────────────────────────────────────

/**
 * Move the genre's books and markers into `<directory>/<genre>/`.
 *
 * @throws LibraryOperationError when the genre folder cannot be created.
 */
export async function moveGenre(
  directory: string,
  genre: string,
  index: GenreIndex,
  extensions: readonly string[],
  logger?: pino.Logger,
): Promise<MoveResult> {
  const targetDirectory = path.join(directory, genreFolderName(genre));
  const books = await filesForGenre(directory, genre, index, extensions);
  const result: MoveResult = { genre, targetDirectory, moved: 0, errors: [] };

  if (books.length === 0) {
    logger?.info({ genre }, "no books found for genre");
    return result;
  }

  try {
    await fs.mkdir(targetDirectory, { recursive: true });
  } catch (err) {
    throw new LibraryOperationError(
      `Could not create folder ${targetDirectory}: ${describe(err)}`,
      genre,
      { cause: err },
    );
  }

  for (const { baseName, files } of books) {
    let stem: string;
    try {
      stem = await uniqueStem(targetDirectory, baseName, files);
    } catch (err) {
      for (const name of files) result.errors.push(`${name}: ${describe(err)}`);
      continue;
    }

    for (const name of files) {
      const destination = path.join(targetDirectory, `${stem}${name.slice(baseName.length)}`);
      try {
        await fs.rename(path.join(directory, name), destination);
        result.moved++;
      } catch (err) {
        result.errors.push(`${name}: ${describe(err)}`);
      }
    }
  }

  logger?.info(
    { genre, targetDirectory, moved: result.moved, errors: result.errors.length },
    "moved genre books",
  );
  return result;
}

// ── Delete ──────────────────────────────────────────────────────────────────

/**
 * Delete the genre's books and markers once `confirm` approves. A declined
 * confirmation touches nothing.
 */
export async function deleteGenre(
  directory: string,
  genre: string,
  index: GenreIndex,
  extensions: readonly string[],
  confirm: ConfirmFn,
  logger?: pino.Logger,
): Promise<DeleteResult> {
  const result: DeleteResult = { genre, cancelled: false, deleted: 0, errors: [] };

  const approved = await confirm(
    `Are you sure you want to delete all books for genre '${genre}'?`,
  );
  if (!approved) {
    logger?.info({ genre }, "delete cancelled");
    return { ...result, cancelled: true };
  }

  const books = await filesForGenre(directory, genre, index, extensions);
  for (const name of books.flatMap((book) => book.files)) {
    try {
      await fs.unlink(path.join(directory, name));
      result.deleted++;
    } catch (err) {
      result.errors.push(`${name}: ${describe(err)}`);
    }
  }

  logger?.info(
    { genre, deleted: result.deleted, errors: result.errors.length },
    "deleted genre books",
  );
  return result;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

async function anyExists(
  directory: string,
  stem: string,
  suffixes: readonly string[],
): Promise<boolean> {
  for (const suffix of suffixes) {
    try {
      await fs.access(path.join(directory, `${stem}${suffix}`));
      return true;
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }
  return false;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
