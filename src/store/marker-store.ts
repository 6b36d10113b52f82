// ---------------------------------------------------------------------------
// MarkerStore – one flat text file per processed book.
//
// `<dir>/<book base name>.txt` sits next to the book and holds either a
// comma-separated genre list, `unpopular`, or `unknown`. The presence of the
// file is what marks a book as processed.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";

import type { BookFile, GenreOutcome } from "../core/types.js";
import { outcomeFromGenres, UNKNOWN, UNPOPULAR } from "../core/outcome.js";
import { DirectoryScanError } from "../core/errors.js";

export const MARKER_EXTENSION = ".txt";

const UNPOPULAR_LITERAL = "unpopular";
const UNKNOWN_LITERAL = "unknown";

// ── Encoding ────────────────────────────────────────────────────────────────

/** Flat persisted form of an outcome. */
export function encodeOutcome(outcome: GenreOutcome): string {
  switch (outcome.kind) {
    case "tagged":
      return outcome.genres.join(", ");
    case "unpopular":
      return UNPOPULAR_LITERAL;
    case "unknown":
      return UNKNOWN_LITERAL;
  }
}

/**
 * Rebuild the tagged outcome from a marker's text. The sentinels match the
 * whole record case-insensitively; a blank record reads as `unknown`.
 */
export function decodeOutcome(text: string): GenreOutcome {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  if (lower === UNPOPULAR_LITERAL) return UNPOPULAR;
  if (lower === UNKNOWN_LITERAL) return UNKNOWN;
  return outcomeFromGenres(trimmed.split(","));
}

// ── Store ───────────────────────────────────────────────────────────────────

export class MarkerStore {
  markerPath(book: BookFile): string {
    return path.join(book.directory, `${book.baseName}${MARKER_EXTENSION}`);
  }

  async hasOutcome(book: BookFile): Promise<boolean> {
    try {
      await fs.access(this.markerPath(book));
      return true;
    } catch {
      return false;
    }
  }

  /** Replace the book's marker with the encoded outcome. */
  async writeOutcome(book: BookFile, outcome: GenreOutcome): Promise<string> {
    const file = this.markerPath(book);
    await fs.writeFile(file, encodeOutcome(outcome), "utf-8");
    return file;
  }

  async readOutcome(book: BookFile): Promise<GenreOutcome | null> {
    try {
      return decodeOutcome(await fs.readFile(this.markerPath(book), "utf-8"));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  /**
   * Decoded outcome of every marker in `directory` (not recursive), keyed by
   * book base name.
   */
  async listOutcomes(directory: string): Promise<Map<string, GenreOutcome>> {
    let entries: string[];
    try {
      entries = await fs.readdir(directory);
    } catch (err) {
      throw new DirectoryScanError(directory, { cause: err });
    }

    const markers = entries
      .filter((name) => name.toLowerCase().endsWith(MARKER_EXTENSION))
      .sort();

    const outcomes = new Map<string, GenreOutcome>();
    for (const name of markers) {
      const file = path.join(directory, name);
      const stat = await fs.stat(file);
      if (!stat.isFile()) continue;
      const text = await fs.readFile(file, "utf-8");
      outcomes.set(name.slice(0, -MARKER_EXTENSION.length), decodeOutcome(text));
    }
    return outcomes;
  }
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}
