// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { ErrorHandler } from "hono";
import {
  DirectoryScanError,
  InvalidRequestError,
  LibraryOperationError,
} from "../../core/errors.js";
import type { AppEnv } from "../env.js";

export interface ErrorHandlerOptions {
  /** Include internal error messages in 500 responses (off in production). */
  exposeErrors: boolean;
}

/**
 * Mapping:
 * - `InvalidRequestError`   -> 400 `invalid_request`
 * - `DirectoryScanError`    -> 404 `directory_not_found`
 * - `LibraryOperationError` -> 500 `library_operation_error`
 * - Everything else         -> 500 `internal_error`
 *
 * Validation and library messages only describe caller input, so they are
 * always returned. Unexpected errors are logged and, unless
 * `exposeErrors` is set, answered with a generic message.
 */
export function createErrorHandler(
  options: ErrorHandlerOptions,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof InvalidRequestError) {
      return c.json(
        { error: err.message, type: "invalid_request", issues: err.issues },
        400,
      );
    }

    if (err instanceof DirectoryScanError) {
      return c.json(
        {
          error: `Directory not found or unreadable: ${err.directory}`,
          type: "directory_not_found",
        },
        404,
      );
    }

    if (err instanceof LibraryOperationError) {
      c.get("logger").error({ err, genre: err.genre }, "library operation failed");
      return c.json(
        { error: err.message, type: "library_operation_error" },
        500,
      );
    }

    c.get("logger").error({ err }, "unhandled error");
    const message = options.exposeErrors ? err.message : "Internal server error";
    return c.json({ error: message, type: "internal_error" }, 500);
  };
}
