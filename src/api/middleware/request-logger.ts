import type { MiddlewareHandler } from "hono";
import type { Logger } from "../../config/logger.js";

/**
 * Log every request on entry (method + path) and on exit (status + duration).
 *
 * For SSE responses the exit line marks when headers were sent, not when the
 * stream ended.
 */
export function requestLogger(logger: Logger, now: () => number = Date.now): MiddlewareHandler {
  return async (c, next) => {
    const started = now();
    logger.info(`${c.req.method} ${c.req.path}`);

    await next();

    logger.info(`Response: ${c.res.status}`, {
      method: c.req.method,
      path: c.req.path,
      durationMs: now() - started,
    });
  };
}
