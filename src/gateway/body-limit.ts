import type { Context } from "hono";
import { bodyLimit } from "hono/body-limit";

/** Body size limits for gateway routes (bytes). */
export const BODY_LIMITS = {
  /** Chat completions */
  LLM: 10 * 1024 * 1024, // 10 MB
} as const;

/** Standard 413 error response matching gateway error format. */
function onBodyLimitError(maxSize: number) {
  return (c: Context) =>
    c.json(
      {
        error: {
          message: `Request body too large. Maximum size is ${Math.round(maxSize / (1024 * 1024))}MB.`,
          type: "invalid_request_error",
          code: "request_too_large",
        },
      },
      413,
    );
}

/** Body limit middleware for LLM routes (10MB). */
export const llmBodyLimit = () => bodyLimit({ maxSize: BODY_LIMITS.LLM, onError: onBodyLimitError(BODY_LIMITS.LLM) });
