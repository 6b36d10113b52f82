// ---------------------------------------------------------------------------
// LibrarySession – command handlers for browsing one directory by genre.
//
// Holds the current index, the genre filter and the (single) selected genre.
// A presentation layer drives it; it knows nothing about events or widgets.
// ---------------------------------------------------------------------------

import type pino from "pino";

import type {
  ConfirmFn,
  DeleteResult,
  GenreEntry,
  MoveResult,
} from "../core/types.js";
import { LibraryOperationError } from "../core/errors.js";
import type { MarkerStore } from "../store/marker-store.js";
import { GenreIndex } from "./genre-index.js";
import { deleteGenre, moveGenre } from "./library-operations.js";

export interface LibrarySessionOptions {
  directory: string;
  extensions: readonly string[];
  store: MarkerStore;
}

export class LibrarySession {
  readonly directory: string;
  private readonly extensions: readonly string[];
  private readonly store: MarkerStore;
  private readonly logger: pino.Logger;

  private index: GenreIndex = GenreIndex.fromOutcomes([]);
  private filterText = "";
  private selected: string | null = null;

  constructor(options: LibrarySessionOptions, logger: pino.Logger) {
    this.directory = options.directory;
    this.extensions = options.extensions;
    this.store = options.store;
    this.logger = logger.child({ module: "library", directory: options.directory });
  }

  /** Rebuild the index from disk. Clears the selection. */
  async refresh(): Promise<GenreIndex> {
    this.index = await GenreIndex.rebuild(this.store, this.directory);
    this.selected = null;
    this.logger.debug({ genres: this.index.size }, "index rebuilt");
    return this.index;
  }

  get currentIndex(): GenreIndex {
    return this.index;
  }

  get selectedGenre(): string | null {
    return this.selected;
  }

  /**
   * Select `genre`, replacing any other selection; toggling the selected
   * genre clears it. Returns the new selection.
   */
  toggle(genre: string): string | null {
    const key = genre.trim().toLowerCase();
    this.selected = this.selected === key ? null : key;
    return this.selected;
  }

  setFilter(text: string): void {
    this.filterText = text;
  }

  visibleGenres(): readonly GenreEntry[] {
    return this.index.filter(this.filterText);
  }

  /** Base names of the books in the selected genre; empty with no selection. */
  selectedBooks(): readonly string[] {
    return this.selected ? this.index.booksFor(this.selected) : [];
  }

  async moveSelected(): Promise<MoveResult> {
    const genre = this.requireSelection();
    const result = await moveGenre(
      this.directory,
      genre,
      this.index,
      this.extensions,
      this.logger,
    );
    await this.refresh();
    return result;
  }

  async deleteSelected(confirm: ConfirmFn): Promise<DeleteResult> {
    const genre = this.requireSelection();
    const result = await deleteGenre(
      this.directory,
      genre,
      this.index,
      this.extensions,
      confirm,
      this.logger,
    );
    if (!result.cancelled) await this.refresh();
    return result;
  }

  private requireSelection(): string {
    if (!this.selected) {
      throw new LibraryOperationError("Please select a genre first.", "");
    }
    return this.selected;
  }
}
