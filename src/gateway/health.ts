/**
 * Liveness endpoint, GET /health.
 *
 * Reports that the gateway process is serving requests. The upstream agent is
 * not contacted.
 */

import { Hono } from "hono";

export interface HealthResponse {
  status: "ok";
}

export function createHealthRoutes(): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const health: HealthResponse = { status: "ok" };
    return c.json(health);
  });

  return routes;
}
