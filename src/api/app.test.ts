import { describe, expect, it, vi } from "vitest";
import type { AgentClient, AgentEvent } from "../agent/types.js";
import { completedRun, makeDeps, ScriptedAgentClient } from "../test/fakes.js";
import { createApp } from "./app.js";

class ThrowingAgentClient implements AgentClient {
  startRun(): AsyncIterable<AgentEvent> {
    return (async function* (): AsyncGenerator<AgentEvent> {
      yield { type: "run_started" };
      throw new Error("client bug");
    })();
  }
}

const CHAT_BODY = JSON.stringify({
  model: "foundry-agent-model",
  messages: [{ role: "user", content: "Hello" }],
});

function postChat(app: ReturnType<typeof createApp>, headers: Record<string, string> = {}) {
  return app.request("/v1/chat/completions", {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: CHAT_BODY,
  });
}

describe("createApp", () => {
  it("serves /health", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const res = await createApp(deps, { corsOrigins: ["*"] }).request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("answers unknown routes with an OpenAI-style 404", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const res = await createApp(deps, { corsOrigins: ["*"] }).request("/v1/embeddings", { method: "POST" });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: {
        message: "Unknown request URL: POST /v1/embeddings",
        type: "invalid_request_error",
        code: "unknown_url",
      },
    });
  });

  it("turns an unexpected handler error into a generic 500 and reports it", async () => {
    const { deps } = makeDeps(new ThrowingAgentClient());
    const res = await postChat(createApp(deps, { corsOrigins: ["*"] }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: {
        message: "An unexpected error occurred while processing your request.",
        type: "server_error",
        code: "internal_error",
      },
    });
    expect(deps.observability.captureError).toHaveBeenCalledWith(expect.any(Error), {
      route: "/v1/chat/completions",
      source: "onError",
    });
  });

  it("allows any origin with the wildcard setting", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const res = await createApp(deps, { corsOrigins: ["*"] }).request("/health", {
      headers: { Origin: "http://localhost:3000" },
    });
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("echoes only configured origins", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const app = createApp(deps, { corsOrigins: ["https://chat.example.com"] });

    const allowed = await app.request("/health", { headers: { Origin: "https://chat.example.com" } });
    const denied = await app.request("/health", { headers: { Origin: "https://other.example.com" } });

    expect(allowed.headers.get("access-control-allow-origin")).toBe("https://chat.example.com");
    expect(denied.headers.get("access-control-allow-origin")).toBeNull();
  });

  it("exposes the request id header to browsers", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const res = await postChat(createApp(deps, { corsOrigins: ["*"] }), { Origin: "http://localhost:3000" });

    expect(res.status).toBe(200);
    expect(res.headers.get("access-control-expose-headers")).toBe("x-request-id,openai-version,openai-model");
    expect(res.headers.get("x-request-id")).toMatch(/^chatcmpl-/);
  });

  it("sets security headers", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const res = await createApp(deps, { corsOrigins: ["*"] }).request("/health");
    expect(res.headers.get("x-content-type-options")).toBe("nosniff");
  });

  it("logs each request on entry and exit", async () => {
    const { deps } = makeDeps(new ScriptedAgentClient(completedRun("4")));
    const infoSpy = vi.spyOn(deps.observability.logger, "info");

    await createApp(deps, { corsOrigins: ["*"] }).request("/health");

    expect(infoSpy).toHaveBeenCalledWith("GET /health");
    expect(infoSpy).toHaveBeenCalledWith(
      "Response: 200",
      expect.objectContaining({ method: "GET", path: "/health" }),
    );
  });
});
