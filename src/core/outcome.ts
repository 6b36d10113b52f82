// ---------------------------------------------------------------------------
// GenreOutcome constructors and the genre contributions of each outcome.
// ---------------------------------------------------------------------------

import type { GenreOutcome } from "./types.js";

/** Genre the index files `unpopular` books under. */
export const UNPOPULAR_GENRE = "unpopular";

export const UNPOPULAR: GenreOutcome = { kind: "unpopular" };
export const UNKNOWN: GenreOutcome = { kind: "unknown" };

/**
 * Build an outcome from scraped genre labels.
 *
 * Labels are trimmed, blanks dropped and duplicates collapsed (first one
 * wins). An empty result is `unknown`: a `tagged` outcome never has zero
 * genres.
 */
export function outcomeFromGenres(labels: Iterable<string>): GenreOutcome {
  const seen = new Set<string>();
  for (const label of labels) {
    const genre = label.trim();
    if (genre) seen.add(genre);
  }
  if (seen.size === 0) return UNKNOWN;
  return { kind: "tagged", genres: [...seen] };
}

/**
 * Genres an outcome contributes to the index, lower-cased and trimmed.
 */
export function indexGenres(outcome: GenreOutcome): string[] {
  switch (outcome.kind) {
    case "tagged":
      return [
        ...new Set(
          outcome.genres
            .map((g) => g.trim().toLowerCase())
            .filter((g) => g.length > 0),
        ),
      ];
    case "unpopular":
      return [UNPOPULAR_GENRE];
    case "unknown":
      return [];
  }
}
