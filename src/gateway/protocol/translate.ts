/**
 * Response translation from agent run events to OpenAI Chat Completions shapes.
 *
 * One translator per request. It fixes `id` and `created` up front so every
 * chunk of a stream carries the same values, and walks the run through
 * idle, streaming, then completed or failed. Text deltas are passed through
 * untouched: no trimming, merging or re-encoding.
 */

import crypto from "node:crypto";
import type { AgentEvent, RunFailedEvent } from "../../agent/types.js";
import { mapUpstreamFailure } from "../error-mapping.js";
import type { GatewayErrorResponse } from "../types.js";

// ---------------------------------------------------------------------------
// OpenAI response types
// ---------------------------------------------------------------------------

export type FinishReason = "stop" | "error";

export interface ChatCompletionDelta {
  role?: "assistant";
  content?: string;
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: [{ index: 0; delta: ChatCompletionDelta; finish_reason: FinishReason | null }];
  /** Present only on a terminal chunk that ends the stream with an error. */
  error?: GatewayErrorResponse["error"];
}

export interface ChatCompletionUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ChatCompletionResponse {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: [{ index: 0; message: { role: "assistant"; content: string }; finish_reason: "stop" }];
  usage: ChatCompletionUsage;
}

// ---------------------------------------------------------------------------
// Translator
// ---------------------------------------------------------------------------

export type TranslatorState = "idle" | "streaming" | "completed" | "failed";

export type TranslatorOutput = { kind: "chunk"; chunk: ChatCompletionChunk } | { kind: "done" };

export const SSE_DONE = "[DONE]";

/** `chatcmpl-` followed by 29 random hex characters. */
export function newCompletionId(): string {
  return `chatcmpl-${crypto.randomUUID().replace(/-/g, "").slice(0, 29)}`;
}

export interface TranslatorOptions {
  id?: string;
  /** Epoch seconds. */
  created?: number;
}

export class ChatCompletionTranslator {
  readonly id: string;
  readonly created: number;
  private _state: TranslatorState = "idle";
  private _failure: RunFailedEvent | null = null;
  private roleSent = false;
  private readonly parts: string[] = [];

  constructor(
    readonly model: string,
    opts: TranslatorOptions = {},
  ) {
    this.id = opts.id ?? newCompletionId();
    this.created = opts.created ?? Math.floor(Date.now() / 1000);
  }

  get state(): TranslatorState {
    return this._state;
  }

  get finished(): boolean {
    return this._state === "completed" || this._state === "failed";
  }

  /** The failure that ended the run, once in the failed state. */
  get failure(): RunFailedEvent | null {
    return this._failure;
  }

  /** All text received so far, concatenated in arrival order. */
  get content(): string {
    return this.parts.join("");
  }

  /** Advance the state machine. Events after a terminal state produce nothing. */
  handle(event: AgentEvent): TranslatorOutput[] {
    if (this.finished) return [];

    switch (event.type) {
      case "run_started":
        this._state = "streaming";
        return [];

      case "text_delta": {
        this._state = "streaming";
        this.parts.push(event.text);
        const delta: ChatCompletionDelta = this.roleSent
          ? { content: event.text }
          : { role: "assistant", content: event.text };
        this.roleSent = true;
        return [{ kind: "chunk", chunk: this.chunk(delta, null) }];
      }

      case "run_completed":
        this._state = "completed";
        return [{ kind: "chunk", chunk: this.chunk({}, "stop") }, { kind: "done" }];

      case "run_failed": {
        this._state = "failed";
        this._failure = event;
        const terminal = this.chunk({}, "error");
        terminal.error = mapUpstreamFailure(event).body.error;
        return [{ kind: "chunk", chunk: terminal }, { kind: "done" }];
      }
    }
  }

  /** Buffered response for a completed run. */
  toResponse(promptMessages: ReadonlyArray<{ content: string }>): ChatCompletionResponse {
    const content = this.content;
    const promptTokens = promptMessages.reduce((sum, m) => sum + countWords(m.content), 0);
    const completionTokens = countWords(content);
    return {
      id: this.id,
      object: "chat.completion",
      created: this.created,
      model: this.model,
      choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
      usage: {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: promptTokens + completionTokens,
      },
    };
  }

  private chunk(delta: ChatCompletionDelta, finishReason: FinishReason | null): ChatCompletionChunk {
    return {
      id: this.id,
      object: "chat.completion.chunk",
      created: this.created,
      model: this.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }
}

/** Rough token estimate: whitespace-separated words. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

// ---------------------------------------------------------------------------
// Consumers
// ---------------------------------------------------------------------------

const ENDED_EARLY: RunFailedEvent = {
  type: "run_failed",
  kind: "transport",
  reason: "Agent run ended without a result",
};

/** Serialize one translator output as an SSE frame. */
export function formatSSE(output: TranslatorOutput): string {
  return output.kind === "done" ? `data: ${SSE_DONE}\n\n` : `data: ${JSON.stringify(output.chunk)}\n\n`;
}

/**
 * Pull events one at a time and yield the SSE frames they translate to.
 *
 * Always ends with a terminal chunk and `[DONE]`, even when the event
 * sequence stops short of a terminal event.
 */
export async function* streamChatCompletion(
  events: AsyncIterable<AgentEvent>,
  translator: ChatCompletionTranslator,
): AsyncGenerator<string> {
  for await (const event of events) {
    for (const output of translator.handle(event)) {
      yield formatSSE(output);
    }
    if (translator.finished) return;
  }
  for (const output of translator.handle(ENDED_EARLY)) {
    yield formatSSE(output);
  }
}

export type CompletionResult =
  | { ok: true; response: ChatCompletionResponse }
  | { ok: false; failure: RunFailedEvent; partialContent: string };

/** Drain the whole run before producing anything, then build the buffered result. */
export async function collectCompletion(
  events: AsyncIterable<AgentEvent>,
  translator: ChatCompletionTranslator,
  promptMessages: ReadonlyArray<{ content: string }>,
): Promise<CompletionResult> {
  for await (const event of events) {
    translator.handle(event);
    if (translator.finished) break;
  }
  if (!translator.finished) translator.handle(ENDED_EARLY);

  const failure = translator.failure;
  if (failure) return { ok: false, failure, partialContent: translator.content };
  return { ok: true, response: translator.toResponse(promptMessages) };
}
