/**
 * Model discovery: GET /v1/models endpoint.
 *
 * The gateway fronts exactly one agent, so the list is static.
 */

import type { Context } from "hono";
import type { ProtocolDeps } from "./protocol/deps.js";

export interface ModelInfo {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
}

export interface ModelsResponse {
  object: "list";
  data: ModelInfo[];
}

/** GET /v1/models handler: the backing agent as a single model entry. */
export function modelsHandler(deps: Pick<ProtocolDeps, "modelId" | "now">) {
  return (c: Context): Response => {
    const now = deps.now ?? Date.now;
    const response: ModelsResponse = {
      object: "list",
      data: [
        {
          id: deps.modelId,
          object: "model",
          created: Math.floor(now() / 1000),
          owned_by: "foundry",
        },
      ],
    };
    return c.json(response);
  };
}
