// ---------------------------------------------------------------------------
// Tests for moving and deleting a genre's books.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import {
  deleteGenre,
  genreFolderName,
  moveGenre,
  uniqueStem,
} from "../../../src/library/library-operations.js";
import { GenreIndex } from "../../../src/library/genre-index.js";
import { MarkerStore } from "../../../src/store/marker-store.js";
import { LibraryOperationError } from "../../../src/core/errors.js";
import { listDir, makeTempDir, removeTempDir, writeFiles } from "../../helpers/fixtures.js";

const EXTENSIONS = [".epub"];

describe("genreFolderName", () => {
  it("replaces path separators", () => {
    expect(genreFolderName("Sci-Fi/Fantasy")).toBe("sci-fi-fantasy");
    expect(genreFolderName("a\\b")).toBe("a-b");
  });

  it("defuses dot-only names", () => {
    expect(genreFolderName("..")).toBe("--");
  });
});

describe("library operations", () => {
  let dir: string;
  const store = new MarkerStore();

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFiles(dir, {
      "Dune.epub": "dune-book",
      "Dune.txt": "Science Fiction, Classics",
      "Foundation.epub": "foundation-book",
      "Foundation.txt": "Science Fiction",
      "Emma.epub": "emma-book",
      "Emma.txt": "Classics, Romance",
    });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("uniqueStem", () => {
    it("suffixes _1, _2 until every file of the book is free", async () => {
      await writeFiles(dir, { "x.epub": "", "x_1.txt": "" });
      expect(await uniqueStem(dir, "x", ["x.epub", "x.txt"])).toBe("x_2");
      expect(await uniqueStem(dir, "y", ["y.epub", "y.txt"])).toBe("y");
    });
  });

  describe("moveGenre", () => {
    it("moves every book and marker of the genre into its folder", async () => {
      const index = await GenreIndex.rebuild(store, dir);

      const result = await moveGenre(dir, "science fiction", index, EXTENSIONS);

      expect(result).toEqual({
        genre: "science fiction",
        targetDirectory: path.join(dir, "science fiction"),
        moved: 4,
        errors: [],
      });
      expect(await listDir(path.join(dir, "science fiction"))).toEqual([
        "Dune.epub",
        "Dune.txt",
        "Foundation.epub",
        "Foundation.txt",
      ]);
      expect(await listDir(dir)).toEqual(["Emma.epub", "Emma.txt", "science fiction"]);
    });

    it("never overwrites: colliding names get numeric suffixes", async () => {
      const target = path.join(dir, "classics");
      await fs.mkdir(target);
      await writeFiles(target, { "Dune.epub": "older-dune", "Dune_1.epub": "oldest-dune" });
      const index = await GenreIndex.rebuild(store, dir);

      const result = await moveGenre(dir, "classics", index, EXTENSIONS);

      expect(result.moved).toBe(4);
      expect(await listDir(target)).toEqual([
        "Dune.epub",
        "Dune_1.epub",
        "Dune_2.epub",
        "Dune_2.txt",
        "Emma.epub",
        "Emma.txt",
      ]);
      expect(await fs.readFile(path.join(target, "Dune.epub"), "utf-8")).toBe("older-dune");
      expect(await fs.readFile(path.join(target, "Dune_2.epub"), "utf-8")).toBe("dune-book");
      expect(await fs.readFile(path.join(target, "Dune_2.txt"), "utf-8")).toBe(
        "Science Fiction, Classics",
      );
    });

    it("keeps a book and its marker under the same name when only one collides", async () => {
      const target = path.join(dir, "romance");
      await fs.mkdir(target);
      await writeFiles(target, { "Emma.epub": "other-emma" });
      const index = await GenreIndex.rebuild(store, dir);

      const result = await moveGenre(dir, "romance", index, EXTENSIONS);

      expect(result).toMatchObject({ moved: 2, errors: [] });
      expect(await listDir(target)).toEqual(["Emma.epub", "Emma_1.epub", "Emma_1.txt"]);
    });

    it("moves book files whose extension is not lower-case", async () => {
      await writeFiles(dir, { "Hyperion.EPUB": "hyperion-book", "Hyperion.txt": "Science Fiction" });
      const index = await GenreIndex.rebuild(store, dir);

      const result = await moveGenre(dir, "science fiction", index, EXTENSIONS);

      expect(result).toMatchObject({ moved: 6, errors: [] });
      expect(await listDir(path.join(dir, "science fiction"))).toEqual([
        "Dune.epub",
        "Dune.txt",
        "Foundation.epub",
        "Foundation.txt",
        "Hyperion.EPUB",
        "Hyperion.txt",
      ]);
    });

    it("skips files that are already gone", async () => {
      await fs.rm(path.join(dir, "Foundation.epub"));
      const index = await GenreIndex.rebuild(store, dir);

      const result = await moveGenre(dir, "science fiction", index, EXTENSIONS);

      expect(result.moved).toBe(3);
      expect(result.errors).toEqual([]);
    });

    it("does nothing for a genre without books", async () => {
      const index = await GenreIndex.rebuild(store, dir);

      const result = await moveGenre(dir, "horror", index, EXTENSIONS);

      expect(result.moved).toBe(0);
      expect(await listDir(dir)).not.toContain("horror");
    });

    it("throws LibraryOperationError when the folder cannot be created", async () => {
      // A file occupies the folder's name.
      await writeFiles(dir, { romance: "" });
      const index = await GenreIndex.rebuild(store, dir);

      await expect(moveGenre(dir, "romance", index, EXTENSIONS)).rejects.toBeInstanceOf(
        LibraryOperationError,
      );
      expect(await listDir(dir)).toContain("Emma.epub");
    });
  });

  describe("deleteGenre", () => {
    it("does nothing when the confirmation is declined", async () => {
      const index = await GenreIndex.rebuild(store, dir);
      const confirm = vi.fn().mockReturnValue(false);

      const result = await deleteGenre(dir, "classics", index, EXTENSIONS, confirm);

      expect(result).toEqual({ genre: "classics", cancelled: true, deleted: 0, errors: [] });
      expect(confirm).toHaveBeenCalledWith(
        "Are you sure you want to delete all books for genre 'classics'?",
      );
      expect(await listDir(dir)).toHaveLength(6);
    });

    it("removes every book and marker once confirmed", async () => {
      const index = await GenreIndex.rebuild(store, dir);

      const result = await deleteGenre(dir, "classics", index, EXTENSIONS, async () => true);

      expect(result).toEqual({ genre: "classics", cancelled: false, deleted: 4, errors: [] });
      expect(await listDir(dir)).toEqual(["Foundation.epub", "Foundation.txt"]);
    });

    it("removes book files whose extension is not lower-case", async () => {
      await writeFiles(dir, { "Hyperion.EPUB": "hyperion-book", "Hyperion.txt": "Horror" });
      const index = await GenreIndex.rebuild(store, dir);

      const result = await deleteGenre(dir, "horror", index, EXTENSIONS, () => true);

      expect(result).toEqual({ genre: "horror", cancelled: false, deleted: 2, errors: [] });
      expect(await listDir(dir)).not.toContain("Hyperion.EPUB");
      expect(await listDir(dir)).toHaveLength(6);
    });

    it("leaves files of other formats alone", async () => {
      await writeFiles(dir, { "Emma.pdf": "emma-scan" });
      const index = await GenreIndex.rebuild(store, dir);

      await deleteGenre(dir, "romance", index, EXTENSIONS, () => true);

      expect(await listDir(dir)).toEqual([
        "Dune.epub",
        "Dune.txt",
        "Emma.pdf",
        "Foundation.epub",
        "Foundation.txt",
      ]);
    });
  });
});
