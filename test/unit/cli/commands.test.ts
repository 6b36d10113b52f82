import path from "node:path";
import { describe, it, expect } from "vitest";

import { parseCommand, UsageError } from "../../../src/cli/commands.js";

describe("parseCommand", () => {
  it("parses process with a resolved directory", () => {
    expect(parseCommand(["process", "books"])).toEqual({
      name: "process",
      directory: path.resolve("books"),
    });
  });

  it("parses genres with an optional filter", () => {
    expect(parseCommand(["genres", "/lib", "--filter", "fic"])).toEqual({
      name: "genres",
      directory: path.resolve("/lib"),
      filter: "fic",
    });
    expect(parseCommand(["genres", "/lib"])).toMatchObject({ filter: "" });
  });

  it("parses books and move with a genre", () => {
    expect(parseCommand(["books", "/lib", "science fiction"])).toEqual({
      name: "books",
      directory: path.resolve("/lib"),
      genre: "science fiction",
    });
    expect(parseCommand(["move", "/lib", "horror"])).toMatchObject({
      name: "move",
      genre: "horror",
    });
  });

  it("asks for confirmation on delete unless --yes is given", () => {
    expect(parseCommand(["delete", "/lib", "horror"])).toMatchObject({ yes: false });
    expect(parseCommand(["delete", "/lib", "horror", "--yes"])).toMatchObject({ yes: true });
    expect(parseCommand(["delete", "-y", "/lib", "horror"])).toMatchObject({ yes: true });
  });

  it("parses serve with an optional port", () => {
    expect(parseCommand(["serve"])).toEqual({ name: "serve", port: undefined });
    expect(parseCommand(["serve", "--port", "8080"])).toEqual({ name: "serve", port: 8080 });
    expect(() => parseCommand(["serve", "--port", "http"])).toThrow("invalid --port: http");
  });

  it("shows help without a command", () => {
    expect(parseCommand([])).toEqual({ name: "help" });
    expect(parseCommand(["process", "--help"])).toEqual({ name: "help" });
  });

  it("rejects unknown commands, unknown options and missing arguments", () => {
    expect(() => parseCommand(["shelve", "/lib"])).toThrow("unknown command: shelve");
    expect(() => parseCommand(["process", "/lib", "--force"])).toThrow(UsageError);
    expect(() => parseCommand(["move", "/lib"])).toThrow("missing <genre>");
    expect(() => parseCommand(["process"])).toThrow("missing <dir>");
  });
});
