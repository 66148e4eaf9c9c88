/**
 * Shared dependencies for the OpenAI protocol routes.
 *
 * Passed in by the composition root; routes hold no module-level state.
 */

import type { AgentClient } from "../../agent/types.js";
import type { ObservabilityContext } from "../../observability/index.js";

export interface ProtocolDeps {
  agentClient: AgentClient;
  observability: Pick<ObservabilityContext, "logger" | "audit" | "captureError">;
  /** Model id advertised on /v1/models. */
  modelId: string;
  /** Clock in epoch milliseconds. Defaults to Date.now. */
  now?: () => number;
  /** Completion id factory. Defaults to newCompletionId. */
  generateId?: () => string;
}
