/**
 * OpenAI protocol handler. Serves the Chat Completions API from the backing agent.
 *
 * For each request this handler:
 * 1. Validates the body against the supported parameter subset
 * 2. Starts one agent run
 * 3. Translates run events into a buffered completion or an SSE stream
 * 4. Records the exchange in the audit trail
 */

import type { Context } from "hono";
import { Hono } from "hono";
import type { AgentRunRequest } from "../../agent/types.js";
import { llmBodyLimit } from "../body-limit.js";
import { mapSchemaError, mapUpstreamFailure, mapValidationError } from "../error-mapping.js";
import { modelsHandler } from "../models.js";
import { createSSEResponse } from "../streaming.js";
import type { ProtocolDeps } from "./deps.js";
import { type ChatRequest, chatRequestSchema } from "./schema.js";
import { ChatCompletionTranslator, collectCompletion, SSE_DONE, streamChatCompletion } from "./translate.js";

/** Headers OpenAI SDKs look at on buffered responses. */
const OPENAI_VERSION = "2020-10-01";

// ---------------------------------------------------------------------------
// Route factory
// ---------------------------------------------------------------------------

/**
 * Create the OpenAI protocol router.
 *
 *   POST /v1/chat/completions
 *   GET  /v1/models
 */
export function createOpenAIRoutes(deps: ProtocolDeps): Hono {
  const app = new Hono();

  // 10MB cap on request bodies
  app.use("/v1/chat/completions", llmBodyLimit());

  app.post("/v1/chat/completions", chatCompletionsHandler(deps));
  app.get("/v1/models", modelsHandler(deps));

  return app;
}

// ---------------------------------------------------------------------------
// Chat Completions: POST /v1/chat/completions
// ---------------------------------------------------------------------------

export function toAgentRunRequest(request: ChatRequest): AgentRunRequest {
  return {
    messages: request.messages,
    temperature: request.temperature,
    maxTokens: request.max_tokens ?? undefined,
  };
}

function chatCompletionsHandler(deps: ProtocolDeps) {
  return async (c: Context) => {
    const { logger } = deps.observability;

    let payload: unknown;
    try {
      payload = await c.req.json();
    } catch {
      const { status, body } = mapValidationError("We could not parse the JSON body of your request.");
      return c.json(body, status);
    }

    const parsed = chatRequestSchema.safeParse(payload);
    if (!parsed.success) {
      const { status, body } = mapSchemaError(parsed.error);
      logger.warn("Rejected chat completion request", { reason: body.error.message });
      return c.json(body, status);
    }

    const request = parsed.data;
    const now = deps.now ?? Date.now;
    const translator = new ChatCompletionTranslator(request.model, {
      id: deps.generateId?.(),
      created: Math.floor(now() / 1000),
    });

    logger.info("Processing chat completion request", {
      requestId: translator.id,
      messages: request.messages.length,
      stream: request.stream === true,
    });

    if (request.stream === true) {
      return streamingCompletion(deps, request, translator);
    }
    return bufferedCompletion(c, deps, request, translator);
  };
}

async function bufferedCompletion(
  c: Context,
  deps: ProtocolDeps,
  request: ChatRequest,
  translator: ChatCompletionTranslator,
): Promise<Response> {
  const { logger, audit } = deps.observability;
  const events = deps.agentClient.startRun(toAgentRunRequest(request));
  const result = await collectCompletion(events, translator, request.messages);

  if (result.ok) {
    logger.info("Returning chat completion", {
      requestId: translator.id,
      completionTokens: result.response.usage.completion_tokens,
    });
    await audit.record({ requestType: "chat_completion_non_streaming", request, response: result.response });
    return c.json(result.response, 200, {
      "openai-version": OPENAI_VERSION,
      "openai-model": request.model,
      "x-request-id": translator.id,
    });
  }

  const { status, body } = mapUpstreamFailure(result.failure);
  logger.error("Chat completion failed", {
    requestId: translator.id,
    kind: result.failure.kind,
    reason: result.failure.reason,
  });
  await audit.record({
    requestType: "chat_completion_error",
    request,
    response: { ...body, partial_content: result.partialContent },
  });
  return c.json(body, status, { "x-request-id": translator.id });
}

function streamingCompletion(deps: ProtocolDeps, request: ChatRequest, translator: ChatCompletionTranslator): Response {
  const { logger, audit, captureError } = deps.observability;
  const controller = new AbortController();
  const events = deps.agentClient.startRun(toAgentRunRequest(request), { signal: controller.signal });

  logger.info("Streaming response requested", { requestId: translator.id });

  return createSSEResponse(streamChatCompletion(events, translator), {
    logger,
    headers: { "x-request-id": translator.id },
    onCancel: () => controller.abort(),
    onClose: ({ frames, cancelled, error }) => {
      const failed = cancelled || error !== undefined || translator.state === "failed";
      const response: Record<string, unknown> = {
        chunks: frames,
        full_content: translator.content,
        chunk_count: frames.filter((f) => f !== `data: ${SSE_DONE}\n\n`).length,
      };
      if (cancelled) response.error = "Client disconnected before the stream ended";
      if (translator.failure) response.error = translator.failure.reason;
      if (error !== undefined) {
        response.error = error instanceof Error ? error.message : String(error);
        captureError(error, { route: "/v1/chat/completions", requestId: translator.id });
      }

      audit
        .record({
          requestType: failed ? "chat_completion_streaming_error" : "chat_completion_streaming",
          request,
          response,
        })
        .catch((err: unknown) => {
          logger.error("Streaming audit failed", {
            requestId: translator.id,
            error: err instanceof Error ? err.message : String(err),
          });
        });
    },
  });
}
