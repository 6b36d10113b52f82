// ---------------------------------------------------------------------------
// Tests for the marker-file store.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  decodeOutcome,
  encodeOutcome,
  MarkerStore,
} from "../../../src/store/marker-store.js";
import { toBookFile } from "../../../src/library/book-scanner.js";
import { DirectoryScanError } from "../../../src/core/errors.js";
import { UNKNOWN, UNPOPULAR } from "../../../src/core/outcome.js";
import { makeTempDir, readText, removeTempDir, writeFiles } from "../../helpers/fixtures.js";

describe("encodeOutcome / decodeOutcome", () => {
  it("joins tagged genres with a comma and a space", () => {
    expect(encodeOutcome({ kind: "tagged", genres: ["Fantasy", "Young Adult"] })).toBe(
      "Fantasy, Young Adult",
    );
  });

  it("writes the sentinels literally", () => {
    expect(encodeOutcome(UNPOPULAR)).toBe("unpopular");
    expect(encodeOutcome(UNKNOWN)).toBe("unknown");
  });

  it("decodes sentinels case-insensitively", () => {
    expect(decodeOutcome(" Unpopular\n")).toEqual(UNPOPULAR);
    expect(decodeOutcome("UNKNOWN")).toEqual(UNKNOWN);
  });

  it("splits genre lists on commas", () => {
    expect(decodeOutcome("Fantasy, Young Adult,Horror")).toEqual({
      kind: "tagged",
      genres: ["Fantasy", "Young Adult", "Horror"],
    });
  });

  it("keeps a sentinel word inside a genre list as a genre", () => {
    expect(decodeOutcome("Mystery, Unknown")).toEqual({
      kind: "tagged",
      genres: ["Mystery", "Unknown"],
    });
  });

  it("reads an empty record as unknown", () => {
    expect(decodeOutcome("")).toEqual(UNKNOWN);
    expect(decodeOutcome(" , ")).toEqual(UNKNOWN);
  });
});

describe("MarkerStore", () => {
  let dir: string;
  const store = new MarkerStore();

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("places the marker next to the book, named after its base name", () => {
    const book = toBookFile(dir, "Emma - Jane Austen.epub");
    expect(store.markerPath(book)).toBe(path.join(dir, "Emma - Jane Austen.txt"));
  });

  it("writes, detects and reads back an outcome", async () => {
    const book = toBookFile(dir, "Emma.epub");
    expect(await store.hasOutcome(book)).toBe(false);
    expect(await store.readOutcome(book)).toBeNull();

    const file = await store.writeOutcome(book, { kind: "tagged", genres: ["Classics", "Romance"] });

    expect(await readText(file)).toBe("Classics, Romance");
    expect(await store.hasOutcome(book)).toBe(true);
    expect(await store.readOutcome(book)).toEqual({
      kind: "tagged",
      genres: ["Classics", "Romance"],
    });
  });

  it("replaces the whole file on rewrite", async () => {
    const book = toBookFile(dir, "Emma.epub");
    await store.writeOutcome(book, { kind: "tagged", genres: ["Classics", "Romance"] });
    await store.writeOutcome(book, UNPOPULAR);

    expect(await readText(store.markerPath(book))).toBe("unpopular");
  });

  it("lists every marker in the directory by base name", async () => {
    await writeFiles(dir, {
      "Emma.epub": "",
      "Emma.txt": "Classics",
      "Obscure.txt": "unpopular",
      "Lost.txt": "unknown",
      "notes.md": "not a marker",
    });
    await fs.mkdir(path.join(dir, "folder.txt"));

    const outcomes = await store.listOutcomes(dir);

    expect([...outcomes.keys()]).toEqual(["Emma", "Lost", "Obscure"]);
    expect(outcomes.get("Emma")).toEqual({ kind: "tagged", genres: ["Classics"] });
    expect(outcomes.get("Obscure")).toEqual(UNPOPULAR);
    expect(outcomes.get("Lost")).toEqual(UNKNOWN);
  });

  it("throws DirectoryScanError for a missing directory", async () => {
    await expect(store.listOutcomes(path.join(dir, "missing"))).rejects.toBeInstanceOf(
      DirectoryScanError,
    );
  });
});
