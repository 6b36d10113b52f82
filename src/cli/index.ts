#!/usr/bin/env node
// ---------------------------------------------------------------------------
// genre-shelf command line.
// ---------------------------------------------------------------------------

import { createInterface } from "node:readline/promises";
import { serve } from "@hono/node-server";

import { loadConfig } from "../config/config.js";
import { buildApp, buildGenreShelf } from "../app.js";
import type { GenreShelf } from "../genre-shelf.js";
import { GenreShelfError } from "../core/errors.js";
import { parseCommand, UsageError, USAGE, type Command } from "./commands.js";
import { printProgress, printSummary, startProgress } from "./progress.js";

async function confirmOnTerminal(prompt: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${prompt} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    rl.close();
  }
}

async function runOnShelf(shelf: GenreShelf, command: Command): Promise<number> {
  switch (command.name) {
    case "process": {
      let clock = startProgress(0);
      const summary = await shelf.process(command.directory, {
        onBatchComplete: (done, total) => {
          if (clock.total !== total) clock = { ...clock, total };
          printProgress(clock, done);
        },
      });
      printSummary(summary);
      return 0;
    }

    case "genres": {
      const index = await shelf.index(command.directory);
      const entries = index.filter(command.filter);
      if (entries.length === 0) console.log("No genres found.");
      for (const { genre, count } of entries) console.log(`${genre} (${count})`);
      return 0;
    }

    case "books": {
      const index = await shelf.index(command.directory);
      for (const book of index.booksFor(command.genre)) console.log(book);
      return 0;
    }

    case "move": {
      const result = await shelf.move(command.directory, command.genre);
      if (result.moved === 0 && result.errors.length === 0) {
        console.log("No books found for selected genre.");
        return 0;
      }
      console.log(`Moved ${result.moved} files to ${result.targetDirectory}`);
      for (const error of result.errors) console.error(`  ${error}`);
      return result.errors.length > 0 ? 1 : 0;
    }

    case "delete": {
      const confirm = command.yes ? () => true : confirmOnTerminal;
      const result = await shelf.delete(command.directory, command.genre, confirm);
      if (result.cancelled) {
        console.log("Cancelled.");
        return 0;
      }
      console.log(`Deleted ${result.deleted} files for genre '${result.genre}'.`);
      for (const error of result.errors) console.error(`  ${error}`);
      return result.errors.length > 0 ? 1 : 0;
    }

    case "serve":
    case "help":
      return 0;
  }
}

async function main(argv: string[]): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`${err.message}\n\n${USAGE}`);
    return 2;
  }

  if (command.name === "help") {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();

  if (command.name === "serve") {
    const { app, logger } = buildApp(config);
    const port = command.port ?? config.server.port;
    serve({ fetch: app.fetch, port }, (info) => {
      logger.info({ port: info.port }, "genre-shelf listening");
    });
    // The open server keeps the process alive.
    return 0;
  }

  const shelf = buildGenreShelf(config);
  try {
    return await runOnShelf(shelf, command);
  } finally {
    await shelf.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof GenreShelfError) {
      console.error(`error: ${err.message}`);
    } else {
      console.error(err);
    }
    process.exitCode = 1;
  },
);
