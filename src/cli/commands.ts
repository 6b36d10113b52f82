// ---------------------------------------------------------------------------
// Command-line parsing: argv -> typed command.
// ---------------------------------------------------------------------------

import { parseArgs } from "node:util";
import path from "node:path";

export type Command =
  | { name: "process"; directory: string }
  | { name: "genres"; directory: string; filter: string }
  | { name: "books"; directory: string; genre: string }
  | { name: "move"; directory: string; genre: string }
  | { name: "delete"; directory: string; genre: string; yes: boolean }
  | { name: "serve"; port: number | undefined }
  | { name: "help" };

export const USAGE = `Usage: genre-shelf <command> [options]

Commands:
  process <dir>                 Tag every unmarked book in <dir>
  genres <dir> [--filter text]  List genres by frequency
  books <dir> <genre>           List the books filed under <genre>
  move <dir> <genre>            Move a genre's books into <dir>/<genre>/
  delete <dir> <genre> [--yes]  Delete a genre's books (asks unless --yes)
  serve [--port n]              Start the HTTP API

Environment:
  GENRE_SHELF_CONFIG            YAML configuration file
  ANTHROPIC_API_KEY             Enables model-based query clean-up`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function positional(args: string[], index: number, label: string): string {
  const value = args[index];
  if (value === undefined || value.trim() === "") {
    throw new UsageError(`missing <${label}>`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        filter: { type: "string", short: "f" },
        yes: { type: "boolean", short: "y", default: false },
        port: { type: "string", short: "p" },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse `argv` (without the node and script entries).
 *
 * @throws UsageError on an unknown command, option or missing argument.
 */
export function parseCommand(argv: string[]): Command {
  const { values, positionals } = readArgs(argv);
  const [name, ...args] = positionals;
  if (values.help || name === undefined || name === "help") {
    return { name: "help" };
  }

  const dir = (): string => path.resolve(positional(args, 0, "dir"));

  switch (name) {
    case "process":
      return { name, directory: dir() };
    case "genres":
      return { name, directory: dir(), filter: values.filter ?? "" };
    case "books":
    case "move":
      return { name, directory: dir(), genre: positional(args, 1, "genre") };
    case "delete":
      return {
        name,
        directory: dir(),
        genre: positional(args, 1, "genre"),
        yes: values.yes === true,
      };
    case "serve": {
      if (values.port === undefined) return { name, port: undefined };
      const port = Number(values.port);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new UsageError(`invalid --port: ${values.port}`);
      }
      return { name, port };
    }
    default:
      throw new UsageError(`unknown command: ${name}`);
  }
}
