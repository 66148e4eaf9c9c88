/**
 * Mapping from Foundry agent stream events to AgentEvents.
 *
 * Payloads arrive as SDK objects (camelCase fields); they are narrowed
 * structurally so unknown shapes are skipped rather than trusted.
 */

import type { AgentEvent } from "./types.js";

/** One server-sent event from the agent run stream. */
export interface RawAgentStreamEvent {
  event: string;
  data: unknown;
}

export interface MappedStreamEvent {
  events: AgentEvent[];
  /** The upstream stream signalled its end. */
  done: boolean;
}

const FAILED_RUN_EVENTS: Record<string, string> = {
  "thread.run.failed": "Agent run failed",
  "thread.run.cancelled": "Agent run was cancelled",
  "thread.run.expired": "Agent run expired",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(value: unknown, key: string): string | undefined {
  if (!isRecord(value)) return undefined;
  const field = value[key];
  return typeof field === "string" ? field : undefined;
}

/** Text of every text part in a message delta, in part order. Empty parts are dropped. */
export function extractDeltaText(data: unknown): string[] {
  if (!isRecord(data) || !isRecord(data.delta)) return [];
  const content = data.delta.content;
  if (!Array.isArray(content)) return [];

  const texts: string[] = [];
  for (const part of content) {
    if (!isRecord(part) || part.type !== "text") continue;
    const value = readString(part.text, "value");
    if (value) texts.push(value);
  }
  return texts;
}

function runErrorMessage(data: unknown): string | undefined {
  if (!isRecord(data)) return undefined;
  const lastError = data.lastError ?? data.last_error;
  return readString(lastError, "message");
}

function streamErrorMessage(data: unknown): string {
  if (typeof data === "string" && data.trim()) return data;
  if (isRecord(data)) {
    const message = readString(data, "message") ?? readString(data.error, "message");
    if (message) return message;
  }
  return "Agent stream reported an error";
}

export function mapStreamEvent(raw: RawAgentStreamEvent): MappedStreamEvent {
  switch (raw.event) {
    case "thread.run.created":
      return { events: [{ type: "run_started", runId: readString(raw.data, "id") }], done: false };

    case "thread.message.delta":
      return { events: extractDeltaText(raw.data).map((text) => ({ type: "text_delta", text })), done: false };

    case "thread.run.completed":
      return { events: [{ type: "run_completed" }], done: false };

    case "thread.run.failed":
    case "thread.run.cancelled":
    case "thread.run.expired": {
      const detail = runErrorMessage(raw.data);
      const base = FAILED_RUN_EVENTS[raw.event] ?? "Agent run failed";
      return {
        events: [{ type: "run_failed", kind: "agent", reason: detail ? `${base}: ${detail}` : base }],
        done: false,
      };
    }

    case "error":
      return { events: [{ type: "run_failed", kind: "transport", reason: streamErrorMessage(raw.data) }], done: false };

    case "done":
      return { events: [], done: true };

    default:
      return { events: [], done: false };
  }
}
