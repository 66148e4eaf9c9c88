import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  mapInternalError,
  mapNotFound,
  mapSchemaError,
  mapUpstreamFailure,
  mapValidationError,
} from "../../src/gateway/error-mapping.js";

describe("mapUpstreamFailure", () => {
  it("maps auth failures to 502 with the generic reason", () => {
    const result = mapUpstreamFailure({ type: "run_failed", kind: "auth", reason: "Failed to authenticate" });
    expect(result.status).toBe(502);
    expect(result.body).toEqual({
      error: { message: "Failed to authenticate", type: "upstream_error", code: "upstream_auth_failed" },
    });
  });

  it("maps timeouts to 504", () => {
    const result = mapUpstreamFailure({ type: "run_failed", kind: "timeout", reason: "slow" });
    expect(result.status).toBe(504);
    expect(result.body.error.code).toBe("upstream_timeout");
  });

  it("maps transport failures to 502", () => {
    const result = mapUpstreamFailure({ type: "run_failed", kind: "transport", reason: "reset" });
    expect(result.status).toBe(502);
    expect(result.body.error.code).toBe("upstream_unavailable");
  });

  it("maps agent-side run failures to 500", () => {
    const result = mapUpstreamFailure({ type: "run_failed", kind: "agent", reason: "Agent run failed" });
    expect(result.status).toBe(500);
    expect(result.body.error.type).toBe("server_error");
    expect(result.body.error.code).toBe("agent_run_failed");
  });
});

describe("mapValidationError", () => {
  it("builds an invalid_request_error with the offending param", () => {
    expect(mapValidationError("bad", "messages")).toEqual({
      status: 400,
      body: { error: { message: "bad", type: "invalid_request_error", param: "messages", code: "invalid_request" } },
    });
  });
});

describe("mapSchemaError", () => {
  it("names the first failing field", () => {
    const parsed = z.object({ n: z.number() }).safeParse({ n: "x" });
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const result = mapSchemaError(parsed.error);
    expect(result.status).toBe(400);
    expect(result.body.error.param).toBe("n");
    expect(result.body.error.message).toBe("Invalid value for 'n': Expected number, received string");
  });

  it("omits the param for root-level issues", () => {
    const parsed = z.object({}).strict().safeParse("nope");
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    const result = mapSchemaError(parsed.error);
    expect(result.body.error.param).toBeNull();
    expect(result.body.error.message).toBe("Expected object, received string");
  });
});

describe("mapInternalError / mapNotFound", () => {
  it("returns a generic 500", () => {
    expect(mapInternalError().status).toBe(500);
    expect(mapInternalError().body.error.code).toBe("internal_error");
  });

  it("returns a 404 naming the route", () => {
    const result = mapNotFound("GET", "/v1/engines");
    expect(result.status).toBe(404);
    expect(result.body.error.message).toBe("Unknown request URL: GET /v1/engines");
  });
});
