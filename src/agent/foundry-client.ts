/**
 * Foundry agent client: one thread and one streamed run per chat request.
 *
 * The Azure SDK is reached through a small FoundryTransport seam so the run
 * lifecycle (deadline, cancellation, failure reporting) is testable in process.
 */

import type { AgentsClient } from "@azure/ai-agents";
import type { Logger } from "../config/logger.js";
import { classifyUpstreamError } from "./errors.js";
import { mapStreamEvent, type RawAgentStreamEvent } from "./events.js";
import type { AgentClient, AgentEvent, AgentRunOptions, AgentRunRequest, ConversationMessage } from "./types.js";

export interface ThreadSeedMessage {
  role: "user" | "assistant";
  content: string;
}

export interface FoundryRunOptions {
  additionalInstructions?: string;
  temperature?: number;
  maxCompletionTokens?: number;
  signal: AbortSignal;
}

export interface FoundryTransport {
  /** Create a thread holding the conversation; returns its id. */
  createThread(messages: ThreadSeedMessage[], signal: AbortSignal): Promise<string>;
  /** Start a run on the thread and open its event stream. */
  streamRun(threadId: string, options: FoundryRunOptions): Promise<AsyncIterable<RawAgentStreamEvent>>;
}

export interface FoundryAgentClientOptions {
  logger: Logger;
  /** Deadline for a whole run, thread creation included. */
  timeoutMs: number;
}

async function* toRawEvents<T extends { event: unknown; data: unknown }>(
  stream: AsyncIterable<T>,
): AsyncGenerator<RawAgentStreamEvent> {
  for await (const message of stream) {
    yield { event: String(message.event), data: message.data };
  }
}

/** Transport backed by the Azure AI Agents SDK. */
export function createAzureTransport(client: AgentsClient, agentId: string): FoundryTransport {
  return {
    async createThread(messages, signal) {
      const thread = await client.threads.create({ messages, abortSignal: signal });
      return thread.id;
    },

    async streamRun(threadId, options) {
      const stream = await client.runs
        .create(threadId, agentId, {
          additionalInstructions: options.additionalInstructions,
          temperature: options.temperature,
          maxCompletionTokens: options.maxCompletionTokens,
          abortSignal: options.signal,
        })
        .stream();
      return toRawEvents(stream);
    },
  };
}

/** Split system prompts (run instructions) from the thread's user/assistant turns. */
export function splitConversation(messages: ConversationMessage[]): {
  seed: ThreadSeedMessage[];
  instructions?: string;
} {
  const system: string[] = [];
  const seed: ThreadSeedMessage[] = [];
  for (const msg of messages) {
    if (msg.role === "system") {
      system.push(msg.content);
    } else {
      seed.push({ role: msg.role, content: msg.content });
    }
  }
  return { seed, instructions: system.length > 0 ? system.join("\n\n") : undefined };
}

export class FoundryAgentClient implements AgentClient {
  constructor(
    private readonly transport: FoundryTransport,
    private readonly opts: FoundryAgentClientOptions,
  ) {}

  startRun(request: AgentRunRequest, options: AgentRunOptions = {}): AsyncIterable<AgentEvent> {
    return this.run(request, options.signal);
  }

  private async *run(request: AgentRunRequest, callerSignal?: AbortSignal): AsyncGenerator<AgentEvent> {
    if (callerSignal?.aborted) return;

    const { logger, timeoutMs } = this.opts;
    const controller = new AbortController();
    let timedOut = false;
    const deadline = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    let finished = false;
    try {
      const { seed, instructions } = splitConversation(request.messages);
      const threadId = await this.transport.createThread(seed, controller.signal);
      logger.info("Created thread", { threadId, messages: seed.length });

      const events = await this.transport.streamRun(threadId, {
        additionalInstructions: instructions,
        temperature: request.temperature,
        maxCompletionTokens: request.maxTokens,
        signal: controller.signal,
      });

      for await (const raw of events) {
        const mapped = mapStreamEvent(raw);
        for (const event of mapped.events) {
          if (event.type === "run_completed" || event.type === "run_failed") finished = true;
          if (event.type === "run_completed") logger.info("Run completed", { threadId });
          if (event.type === "run_failed") logger.warn("Run failed", { threadId, kind: event.kind, reason: event.reason });
          yield event;
          if (finished) return;
        }
        if (mapped.done) break;
      }

      finished = true;
      logger.warn("Agent stream ended without a terminal run event", { threadId });
      yield { type: "run_failed", kind: "transport", reason: "Agent run stream ended before the run completed" };
    } catch (err) {
      // Caller went away; nobody is left to read a failure event.
      if (callerSignal?.aborted && !timedOut) return;
      if (finished) throw err;
      finished = true;
      const failure = classifyUpstreamError(err, timedOut, timeoutMs);
      logger.error("Agent run error", {
        kind: failure.kind,
        error: err instanceof Error ? err.message : String(err),
      });
      yield failure;
    } finally {
      clearTimeout(deadline);
      callerSignal?.removeEventListener("abort", onCallerAbort);
      if (!finished) controller.abort();
    }
  }
}
