import { vi } from "vitest";
import type { AgentClient, AgentEvent, AgentRunOptions, AgentRunRequest } from "../agent/types.js";
import type { AuditEntryInput, AuditSink } from "../audit/index.js";
import { createLogger, type Logger } from "../config/logger.js";
import type { ProtocolDeps } from "../gateway/index.js";

export function silentLogger(): Logger {
  return createLogger({ level: "debug", silent: true });
}

/** Audit sink that keeps entries in memory. */
export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntryInput[] = [];

  async record(input: AuditEntryInput): Promise<string | null> {
    this.entries.push(input);
    return `audit-${this.entries.length}`;
  }
}

export interface RecordedRun {
  request: AgentRunRequest;
  signal?: AbortSignal;
}

/** Agent client that replays a fixed event script for every run. */
export class ScriptedAgentClient implements AgentClient {
  readonly runs: RecordedRun[] = [];

  constructor(private readonly script: AgentEvent[]) {}

  startRun(request: AgentRunRequest, options: AgentRunOptions = {}): AsyncIterable<AgentEvent> {
    this.runs.push({ request, signal: options.signal });
    const script = this.script;
    return (async function* () {
      for (const event of script) {
        yield event;
      }
    })();
  }
}

export function completedRun(...texts: string[]): AgentEvent[] {
  return [
    { type: "run_started", runId: "run_1" },
    ...texts.map((text): AgentEvent => ({ type: "text_delta", text })),
    { type: "run_completed" },
  ];
}

export function makeDeps(agentClient: AgentClient, overrides?: Partial<ProtocolDeps>) {
  const audit = new MemoryAuditSink();
  const deps: ProtocolDeps = {
    agentClient,
    observability: { logger: silentLogger(), audit, captureError: vi.fn() },
    modelId: "foundry-agent-model",
    now: () => 1_700_000_000_000,
    ...overrides,
  };
  return { deps, audit };
}

/** Split an SSE body into its `data:` payloads. */
export function sseData(body: string): string[] {
  return body
    .split("\n\n")
    .filter((frame) => frame.startsWith("data: "))
    .map((frame) => frame.slice("data: ".length));
}
