// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads an optional YAML file, validates it with Zod, then applies
// environment-variable overrides. Every setting has a default so the tool
// runs with zero configuration.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { parse } from "yaml";

import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const CatalogSelectorsSchema = z.object({
  searchRecord: z
    .string()
    .min(1)
    .default('tr[itemscope][itemtype="http://schema.org/Book"]'),
  ratingText: z
    .string()
    .min(1)
    .default("span.greyText.smallText.uitext span.minirating"),
  detailLink: z.string().min(1).default("a.bookTitle"),
  genreLabel: z
    .string()
    .min(1)
    .default(
      "span.BookPageMetadataSection__genreButton span.Button__labelItem",
    ),
  revealMore: z
    .string()
    .min(1)
    .default('button[aria-label="Show all items in the list"]'),
});

const BookExtensionSchema = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, "extensions start with a dot, e.g. .epub")
  .transform((ext) => ext.toLowerCase())
  .refine((ext) => ext !== ".txt", ".txt is reserved for marker files");

export const AppConfigSchema = z.object({
  env: z.enum(["development", "test", "production"]).default("development"),
  server: z
    .object({
      port: z.coerce.number().int().min(1).max(65_535).default(3000),
    })
    .default({}),
  catalog: z
    .object({
      baseUrl: z.string().url().default("https://www.goodreads.com"),
      popularityThreshold: z.coerce.number().int().min(0).default(500),
      selectors: CatalogSelectorsSchema.default({}),
    })
    .default({}),
  scheduler: z
    .object({
      batchSize: z.coerce.number().int().min(1).max(100).default(15),
    })
    .default({}),
  fetcher: z
    .object({
      kind: z.enum(["http", "browser"]).default("http"),
      timeoutMs: z.coerce.number().int().positive().default(20_000),
      revealWaitMs: z.coerce.number().int().positive().default(1_000),
      userAgent: z
        .string()
        .min(1)
        .default(
          "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36",
        ),
      headless: z.boolean().default(true),
      executablePath: z.string().min(1).optional(),
    })
    .default({}),
  normalizer: z
    .object({
      kind: z.enum(["anthropic", "none"]).default("anthropic"),
      model: z.string().min(1).default("claude-3-5-haiku-latest"),
      maxTokens: z.coerce.number().int().positive().default(200),
    })
    .default({}),
  library: z
    .object({
      bookExtensions: z.array(BookExtensionSchema).min(1).default([".epub"]),
    })
    .default({}),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default("info"),
      prettyPrint: z.boolean().optional(),
      redactSecrets: z.boolean().default(true),
    })
    .default({}),
});

// ── Environment overrides ───────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

/** `[env var, path into the config object]` pairs. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, readonly string[]]> = [
  ["GENRE_SHELF_ENV", ["env"]],
  ["GENRE_SHELF_PORT", ["server", "port"]],
  ["GENRE_SHELF_CATALOG_URL", ["catalog", "baseUrl"]],
  ["GENRE_SHELF_POPULARITY_THRESHOLD", ["catalog", "popularityThreshold"]],
  ["GENRE_SHELF_BATCH_SIZE", ["scheduler", "batchSize"]],
  ["GENRE_SHELF_FETCHER", ["fetcher", "kind"]],
  ["CHROMIUM_PATH", ["fetcher", "executablePath"]],
  ["GENRE_SHELF_NORMALIZER", ["normalizer", "kind"]],
  ["GENRE_SHELF_NORMALIZER_MODEL", ["normalizer", "model"]],
  ["GENRE_SHELF_LOG_LEVEL", ["logging", "level"]],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function setPath(
  target: Record<string, unknown>,
  keys: readonly string[],
  value: string,
): void {
  let node = target;
  keys.forEach((key, i) => {
    if (i === keys.length - 1) {
      node[key] = value;
      return;
    }
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const fresh: Record<string, unknown> = {};
      node[key] = fresh;
      node = fresh;
    }
  });
}

function readConfigFile(configPath: string): Record<string, unknown> {
  const absolute = path.resolve(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${absolute}`, {
      cause: err,
    });
  }

  const parsed: unknown = parse(raw);
  if (parsed == null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(
      `Config file ${absolute} must contain a YAML mapping`,
    );
  }
  return parsed;
}

// ── Public API ──────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  env?: Env;
  /** YAML file to read; defaults to `$GENRE_SHELF_CONFIG` when set. */
  configPath?: string;
}

/**
 * Load the application configuration.
 *
 * Precedence (highest first): environment variables, YAML file, defaults.
 * Throws {@link ConfigurationError} listing every invalid field.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env["GENRE_SHELF_CONFIG"];

  const raw: Record<string, unknown> = configPath
    ? readConfigFile(configPath)
    : {};
  for (const [name, keys] of ENV_OVERRIDES) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      setPath(raw, keys, value);
    }
  }

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const { logging, ...rest } = result.data;
  return {
    ...rest,
    logging: {
      level: logging.level,
      prettyPrint: logging.prettyPrint ?? rest.env === "development",
      redactSecrets: logging.redactSecrets,
    },
  };
}
