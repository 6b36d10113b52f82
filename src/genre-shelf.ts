// ---------------------------------------------------------------------------
// GenreShelf – the consumer-facing facade over pipeline and library.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  BookFile,
  ConfirmFn,
  DeleteResult,
  GenreOutcome,
  ItemError,
  MoveResult,
  PageFetcher,
  RunSummary,
} from "./core/types.js";
import type { MarkerStore } from "./store/marker-store.js";
import type { BatchScheduler, RunHooks } from "./orchestrator/batch-scheduler.js";
import type { RunMetrics } from "./metrics/run-metrics.js";
import { partitionMarkerClashes, scanBooks } from "./library/book-scanner.js";
import { GenreIndex } from "./library/genre-index.js";
import { LibrarySession } from "./library/library-session.js";
import { deleteGenre, moveGenre } from "./library/library-operations.js";

export interface GenreShelfDeps {
  store: MarkerStore;
  scheduler: BatchScheduler;
  fetcher: PageFetcher;
  metrics: RunMetrics;
  extensions: readonly string[];
  logger: pino.Logger;
}

export class GenreShelf {
  private readonly logger: pino.Logger;

  constructor(private readonly deps: GenreShelfDeps) {
    this.logger = deps.logger.child({ module: "genre-shelf" });
  }

  /**
   * Enrich every book in `directory` that has no marker yet.
   *
   * Re-running on a fully processed directory fetches nothing. Of several
   * books sharing a base name only the first is enriched; the others are
   * reported as `scan` errors. Metrics are counted afresh for every run.
   *
   * @throws DirectoryScanError when the directory cannot be read.
   */
  async process(directory: string, hooks: RunHooks = {}): Promise<RunSummary> {
    const start = performance.now();
    const { store, scheduler, metrics, extensions } = this.deps;

    const scanned = await scanBooks(directory, extensions);
    const { books, clashes } = partitionMarkerClashes(scanned);
    const clashErrors: ItemError[] = clashes.map(({ book, claimedBy }) => ({
      fileName: book.fileName,
      stage: "scan",
      message: `shares marker ${store.markerPath(book)} with ${claimedBy.fileName}`,
    }));
    for (const error of clashErrors) {
      this.logger.warn({ fileName: error.fileName }, error.message);
    }

    const pending: BookFile[] = [];
    for (const book of books) {
      if (!(await store.hasOutcome(book))) pending.push(book);
    }

    this.logger.info(
      { directory, discovered: scanned.length, pending: pending.length },
      "starting enrichment run",
    );

    metrics.reset();
    const result = await scheduler.run(pending, hooks);
    const summary: RunSummary = {
      directory,
      discovered: scanned.length,
      skipped: books.length - pending.length,
      processed: result.processed,
      batches: result.batches,
      outcomes: result.outcomes,
      errors: [...clashErrors, ...result.errors],
      durationMs: Math.round(performance.now() - start),
    };

    this.logger.info(
      {
        directory,
        processed: summary.processed,
        skipped: summary.skipped,
        outcomes: summary.outcomes,
        errors: summary.errors.length,
        durationMs: summary.durationMs,
      },
      "enrichment run complete",
    );
    metrics.logReport(this.logger);
    return summary;
  }

  /** Decoded marker of every processed book, keyed by base name. */
  outcomesFor(directory: string): Promise<Map<string, GenreOutcome>> {
    return this.deps.store.listOutcomes(directory);
  }

  index(directory: string): Promise<GenreIndex> {
    return GenreIndex.rebuild(this.deps.store, directory);
  }

  /** A browsing session with its index already built. */
  async session(directory: string): Promise<LibrarySession> {
    const session = new LibrarySession(
      { directory, extensions: this.deps.extensions, store: this.deps.store },
      this.deps.logger,
    );
    await session.refresh();
    return session;
  }

  async move(directory: string, genre: string): Promise<MoveResult> {
    const index = await this.index(directory);
    return moveGenre(directory, genre, index, this.deps.extensions, this.logger);
  }

  async delete(
    directory: string,
    genre: string,
    confirm: ConfirmFn,
  ): Promise<DeleteResult> {
    const index = await this.index(directory);
    return deleteGenre(
      directory,
      genre,
      index,
      this.deps.extensions,
      confirm,
      this.logger,
    );
  }

  /** Release the fetcher (browser pages, if any). */
  async close(): Promise<void> {
    await this.deps.fetcher.close();
  }
}
