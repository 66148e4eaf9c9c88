import { AuthenticationError, CredentialUnavailableError } from "@azure/identity";
import type { RunFailedEvent } from "./types.js";

/** Generic message for credential failures; details stay in the server log. */
export const UPSTREAM_AUTH_FAILURE_MESSAGE = "Failed to authenticate with the upstream agent service";

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  const status = "statusCode" in err ? err.statusCode : "status" in err ? err.status : undefined;
  return typeof status === "number" ? status : undefined;
}

function isAuthFailure(err: unknown): boolean {
  if (err instanceof AuthenticationError || err instanceof CredentialUnavailableError) return true;
  if (err instanceof Error && (err.name === "AuthenticationError" || err.name === "CredentialUnavailableError")) {
    return true;
  }
  const status = statusOf(err);
  return status === 401 || status === 403;
}

/**
 * Classify an exception raised while talking to the agent service.
 *
 * `timedOut` is true when the run's own deadline fired the abort.
 */
export function classifyUpstreamError(err: unknown, timedOut: boolean, timeoutMs: number): RunFailedEvent {
  if (isAuthFailure(err)) {
    return { type: "run_failed", kind: "auth", reason: UPSTREAM_AUTH_FAILURE_MESSAGE };
  }

  const status = statusOf(err);
  if (timedOut || status === 408 || status === 504) {
    return { type: "run_failed", kind: "timeout", reason: `Upstream agent did not finish within ${timeoutMs} ms` };
  }

  const message = err instanceof Error ? err.message : String(err);
  return { type: "run_failed", kind: "transport", reason: `Upstream agent request failed: ${message}` };
}
