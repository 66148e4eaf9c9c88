/**
 * Gateway: OpenAI-compatible surface in front of the backing agent.
 *
 *   POST /v1/chat/completions
 *   GET  /v1/models
 *   GET  /health
 */

import type { Hono } from "hono";
import { createHealthRoutes } from "./health.js";
import type { ProtocolDeps } from "./protocol/deps.js";
import { createOpenAIRoutes } from "./protocol/openai.js";

export type { ProtocolDeps } from "./protocol/deps.js";

/** Mount every gateway route on the given app. */
export function mountGateway(app: Hono, deps: ProtocolDeps): void {
  app.route("/health", createHealthRoutes());
  app.route("/", createOpenAIRoutes(deps));
}
