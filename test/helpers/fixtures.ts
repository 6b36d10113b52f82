// ---------------------------------------------------------------------------
// Shared test fixtures: temp directories, loggers and fake collaborators.
// ---------------------------------------------------------------------------

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";

import type { PageFetcher, PageHints, TextNormalizer } from "../../src/core/types.js";

export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/** A logger whose JSON lines are collected in `lines`. */
export function createCapturingLogger(): {
  logger: pino.Logger;
  lines: Array<Record<string, unknown>>;
} {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(chunk: string) {
        const parsed: unknown = JSON.parse(chunk);
        if (typeof parsed === "object" && parsed !== null) {
          lines.push(Object.fromEntries(Object.entries(parsed)));
        }
      },
    },
  );
  return { logger, lines };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "genre-shelf-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Create each file with the given contents (empty for books). */
export async function writeFiles(
  dir: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [name, contents] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), contents, "utf-8");
  }
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export async function readText(file: string): Promise<string> {
  return fs.readFile(file, "utf-8");
}

// ── Fake fetcher ────────────────────────────────────────────────────────────

export interface FetchCall {
  url: string;
  hints: PageHints | undefined;
}

/**
 * Serves pages by exact URL. Unknown URLs answer with an empty page; URLs
 * mapped to an `Error` reject with it.
 */
export class FakeFetcher implements PageFetcher {
  readonly calls: FetchCall[] = [];
  closed = false;

  constructor(private readonly pages: Map<string, string | Error> = new Map()) {}

  set(url: string, page: string | Error): this {
    this.pages.set(url, page);
    return this;
  }

  async fetch(url: string, hints?: PageHints): Promise<string> {
    this.calls.push({ url, hints });
    const page = this.pages.get(url);
    if (page instanceof Error) throw page;
    return page ?? "<html><body></body></html>";
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/** Text normalizer answering from a table, or failing for unknown names. */
export class TableNormalizer implements TextNormalizer {
  readonly calls: string[] = [];

  constructor(private readonly answers: Record<string, string>) {}

  async normalize(fileName: string): Promise<string> {
    this.calls.push(fileName);
    const answer = this.answers[fileName];
    if (answer === undefined) throw new Error(`no answer for ${fileName}`);
    return answer;
  }
}
