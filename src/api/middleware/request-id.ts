// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../env.js";

const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Stores a request ID on the context as `"requestId"` and echoes it in the
 * `X-Request-ID` response header.
 *
 * A client-supplied `X-Request-ID` is reused when it is a short token of
 * letters, digits, `_` and `-`; anything else is replaced by a fresh UUID
 * so it cannot inject into log lines.
 */
export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing)
        ? existing
        : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
