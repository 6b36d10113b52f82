// ---------------------------------------------------------------------------
// GenreIndex – frequency-ranked view of a directory's markers.
// ---------------------------------------------------------------------------

import type { GenreEntry, GenreOutcome } from "../core/types.js";
import { indexGenres } from "../core/outcome.js";
import type { MarkerStore } from "../store/marker-store.js";

/**
 * Immutable genre → books aggregation. Never patched: build a new one with
 * {@link GenreIndex.rebuild} whenever the directory changes.
 */
export class GenreIndex {
  private readonly byGenre: ReadonlyMap<string, readonly string[]>;
  private readonly ranked: readonly GenreEntry[];

  private constructor(byGenre: Map<string, string[]>) {
    this.byGenre = byGenre;
    this.ranked = [...byGenre.entries()]
      .map(([genre, books]) => ({ genre, count: books.length, books: [...books] }))
      .sort((a, b) =>
        b.count !== a.count
          ? b.count - a.count
          : a.genre < b.genre
            ? -1
            : a.genre > b.genre
              ? 1
              : 0,
      );
  }

  /** Aggregate outcomes keyed by book base name. */
  static fromOutcomes(
    outcomes: Iterable<readonly [string, GenreOutcome]>,
  ): GenreIndex {
    const byGenre = new Map<string, string[]>();
    for (const [baseName, outcome] of outcomes) {
      for (const genre of indexGenres(outcome)) {
        const books = byGenre.get(genre);
        if (books) {
          books.push(baseName);
        } else {
          byGenre.set(genre, [baseName]);
        }
      }
    }
    for (const books of byGenre.values()) books.sort();
    return new GenreIndex(byGenre);
  }

  /** Read every marker in `directory` and aggregate it. */
  static async rebuild(store: MarkerStore, directory: string): Promise<GenreIndex> {
    return GenreIndex.fromOutcomes(await store.listOutcomes(directory));
  }

  /** Genres by frequency, most frequent first, ties by name. */
  entries(): readonly GenreEntry[] {
    return this.ranked;
  }

  get size(): number {
    return this.ranked.length;
  }

  has(genre: string): boolean {
    return this.byGenre.has(normalizeGenre(genre));
  }

  /** Base names of the books filed under `genre`, sorted. */
  booksFor(genre: string): readonly string[] {
    return this.byGenre.get(normalizeGenre(genre)) ?? [];
  }

  /** Ranked entries whose name contains `text`, case-insensitively. */
  filter(text: string): readonly GenreEntry[] {
    const needle = text.trim().toLowerCase();
    if (!needle) return this.ranked;
    return this.ranked.filter((entry) => entry.genre.includes(needle));
  }
}

function normalizeGenre(genre: string): string {
  return genre.trim().toLowerCase();
}
