export type ChatRole = "system" | "user" | "assistant";

export interface ConversationMessage {
  role: ChatRole;
  content: string;
}

/** What one agent run needs from an inbound chat request. */
export interface AgentRunRequest {
  messages: ConversationMessage[];
  temperature?: number;
  /** Forwarded as a hint; the agent may not enforce it. */
  maxTokens?: number;
}

/** Why a run ended without completing. */
export type UpstreamFailureKind = "auth" | "timeout" | "transport" | "agent";

/** Normalized upstream run events, in the order the agent produced them. */
export type AgentEvent =
  | { type: "run_started"; runId?: string }
  | { type: "text_delta"; text: string }
  | { type: "run_completed" }
  | { type: "run_failed"; kind: UpstreamFailureKind; reason: string };

export type RunFailedEvent = Extract<AgentEvent, { type: "run_failed" }>;

export interface AgentRunOptions {
  /** Aborting cancels the upstream run; the sequence then ends without further events. */
  signal?: AbortSignal;
}

/**
 * Starts agent runs.
 *
 * Each call starts a new upstream run lazily on the first pull. The sequence is finite,
 * single-use, and reports upstream failures as one `run_failed` event instead of throwing.
 */
export interface AgentClient {
  startRun(request: AgentRunRequest, options?: AgentRunOptions): AsyncIterable<AgentEvent>;
}
