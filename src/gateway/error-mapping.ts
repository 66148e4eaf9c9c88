/**
 * Error mapping. Translates request and upstream agent failures into
 * OpenAI-compatible error responses.
 *
 * Clients never see raw Azure SDK errors or credential details.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { z } from "zod";
import type { RunFailedEvent } from "../agent/types.js";
import type { GatewayErrorResponse } from "./types.js";

export interface MappedError {
  status: ContentfulStatusCode;
  body: GatewayErrorResponse;
}

/** Map a malformed request to a 400 before any upstream call is made. */
export function mapValidationError(message: string, param: string | null = null): MappedError {
  return {
    status: 400,
    body: {
      error: {
        message,
        type: "invalid_request_error",
        param,
        code: "invalid_request",
      },
    },
  };
}

/** Map the first zod issue to a 400, naming the offending field. */
export function mapSchemaError(error: z.ZodError): MappedError {
  const issue = error.issues[0];
  if (!issue) return mapValidationError("Invalid request body");
  const param = issue.path.length > 0 ? issue.path.join(".") : null;
  const message = param ? `Invalid value for '${param}': ${issue.message}` : issue.message;
  return mapValidationError(message, param);
}

/**
 * Map an upstream run failure to an HTTP status and error body.
 *
 * Used as-is for buffered requests; streaming requests reuse the body inside
 * the terminal chunk and keep HTTP 200.
 */
export function mapUpstreamFailure(failure: RunFailedEvent): MappedError {
  switch (failure.kind) {
    case "auth":
      return {
        status: 502,
        body: {
          error: {
            message: failure.reason,
            type: "upstream_error",
            code: "upstream_auth_failed",
          },
        },
      };
    case "timeout":
      return {
        status: 504,
        body: {
          error: {
            message: failure.reason,
            type: "upstream_error",
            code: "upstream_timeout",
          },
        },
      };
    case "transport":
      return {
        status: 502,
        body: {
          error: {
            message: failure.reason,
            type: "upstream_error",
            code: "upstream_unavailable",
          },
        },
      };
    case "agent":
      return {
        status: 500,
        body: {
          error: {
            message: failure.reason,
            type: "server_error",
            code: "agent_run_failed",
          },
        },
      };
  }
}

/** Body for errors that escaped every route handler. */
export function mapInternalError(): MappedError {
  return {
    status: 500,
    body: {
      error: {
        message: "An unexpected error occurred while processing your request.",
        type: "server_error",
        code: "internal_error",
      },
    },
  };
}

/** Body for unknown routes. */
export function mapNotFound(method: string, path: string): MappedError {
  return {
    status: 404,
    body: {
      error: {
        message: `Unknown request URL: ${method} ${path}`,
        type: "invalid_request_error",
        code: "unknown_url",
      },
    },
  };
}
