// ---------------------------------------------------------------------------
// Hono environment shared by the app, its middleware and routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

export interface AppEnv {
  Variables: {
    /** Correlation id, echoed in `X-Request-ID`. */
    requestId: string;
    /** Request-scoped child logger. */
    logger: pino.Logger;
  };
}
