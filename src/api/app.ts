import { Hono } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { mapInternalError, mapNotFound } from "../gateway/error-mapping.js";
import { mountGateway, type ProtocolDeps } from "../gateway/index.js";
import { requestLogger } from "./middleware/request-logger.js";

export interface AppOptions {
  /** Allowed CORS origins; `["*"]` allows any. */
  corsOrigins: string[];
}

/**
 * Build the HTTP application.
 *
 * Everything the routes need arrives through `deps`; building two apps in one
 * process gives two independent gateways.
 */
export function createApp(deps: ProtocolDeps, opts: AppOptions): Hono {
  const { logger, captureError } = deps.observability;
  const app = new Hono();

  app.use("/*", requestLogger(logger));
  app.use(
    "/*",
    cors({
      origin: opts.corsOrigins.includes("*") ? "*" : opts.corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
      exposeHeaders: ["x-request-id", "openai-version", "openai-model"],
    }),
  );
  app.use("/*", secureHeaders());

  mountGateway(app, deps);

  app.notFound((c) => {
    const { status, body } = mapNotFound(c.req.method, c.req.path);
    return c.json(body, status);
  });

  app.onError((err, c) => {
    logger.error("Unhandled error in request", {
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    });
    captureError(err, { route: c.req.path, source: "onError" });
    const { status, body } = mapInternalError();
    return c.json(body, status);
  });

  return app;
}
