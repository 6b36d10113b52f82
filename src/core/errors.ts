// ---------------------------------------------------------------------------
// Error hierarchy for the genre-shelf service.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all genre-shelf domain errors.
 */
export class GenreShelfError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GenreShelfError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Fetch errors ────────────────────────────────────────────────────────────

/**
 * Base class for errors raised while retrieving a catalog page.
 */
export class FetchError extends GenreShelfError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FetchError";
    this.url = url;
  }
}

/** The page could not be reached at all. */
export class FetchConnectionError extends FetchError {
  constructor(message: string, url: string, options?: ErrorOptions) {
    super(message, url, options);
    this.name = "FetchConnectionError";
  }
}

/** The request ran past its timeout. */
export class FetchTimeoutError extends FetchError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, options?: ErrorOptions) {
    super(`Fetching ${url} timed out after ${timeoutMs}ms`, url, options);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** The catalog answered with a non-2xx status. */
export class FetchHttpError extends FetchError {
  public readonly status: number;

  constructor(url: string, status: number, options?: ErrorOptions) {
    super(`Fetching ${url} failed with HTTP ${status}`, url, options);
    this.name = "FetchHttpError";
    this.status = status;
  }
}

// ── Pipeline errors ─────────────────────────────────────────────────────────

/** The text-normalization capability failed or produced nothing usable. */
export class NormalizationError extends GenreShelfError {
  public readonly fileName: string;

  constructor(fileName: string, reason: string, options?: ErrorOptions) {
    super(`Could not normalize "${fileName}": ${reason}`, options);
    this.name = "NormalizationError";
    this.fileName = fileName;
  }
}

/** The book directory could not be enumerated. Fatal to a run. */
export class DirectoryScanError extends GenreShelfError {
  public readonly directory: string;

  constructor(directory: string, options?: ErrorOptions) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Cannot read book directory ${directory}${reason}`, options);
    this.name = "DirectoryScanError";
    this.directory = directory;
  }
}

// ── Library errors ──────────────────────────────────────────────────────────

/** A move or delete could not start (e.g. the genre folder is not creatable). */
export class LibraryOperationError extends GenreShelfError {
  public readonly genre: string;

  constructor(message: string, genre: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LibraryOperationError";
    this.genre = genre;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends GenreShelfError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

/** An API request failed validation. */
export class InvalidRequestError extends GenreShelfError {
  public readonly issues: string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Invalid request: ${issues.join("; ")}`, options);
    this.name = "InvalidRequestError";
    this.issues = issues;
  }
}
