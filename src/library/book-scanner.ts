import fs from "node:fs/promises";
import path from "node:path";

import type { BookFile } from "../core/types.js";
import { DirectoryScanError } from "../core/errors.js";

/** Describe a file as a {@link BookFile}. */
export function toBookFile(directory: string, fileName: string): BookFile {
  const extension = path.extname(fileName);
  return {
    fileName,
    baseName: fileName.slice(0, fileName.length - extension.length),
    extension: extension.toLowerCase(),
    directory,
    path: path.join(directory, fileName),
  };
}

/**
 * List the book files directly inside `directory` whose extension is one of
 * `extensions`, sorted by file name.
 *
 * @throws DirectoryScanError when the directory cannot be read.
 */
export async function scanBooks(
  directory: string,
  extensions: readonly string[],
): Promise<BookFile[]> {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));

  const entries = await fs
    .readdir(directory, { withFileTypes: true })
    .catch((err: unknown) => {
      throw new DirectoryScanError(directory, { cause: err });
    });

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => toBookFile(directory, entry.name))
    .filter((book) => wanted.has(book.extension))
    .sort((a, b) => a.fileName.localeCompare(b.fileName));
}

/** Books that would share a marker with a book listed before them. */
export interface MarkerClash {
  book: BookFile;
  claimedBy: BookFile;
}

/**
 * Keep the first book of every base name. `Foo.epub` and `Foo.mobi` would
 * both be recorded in `Foo.txt`, so the later one is set aside as a clash.
 */
export function partitionMarkerClashes(books: readonly BookFile[]): {
  books: BookFile[];
  clashes: MarkerClash[];
} {
  const owners = new Map<string, BookFile>();
  const kept: BookFile[] = [];
  const clashes: MarkerClash[] = [];
  for (const book of books) {
    const owner = owners.get(book.baseName);
    if (owner) {
      clashes.push({ book, claimedBy: owner });
    } else {
      owners.set(book.baseName, book);
      kept.push(book);
    }
  }
  return { books: kept, clashes };
}
