import { z } from "zod";

/** Model id the backing agent is published under on /v1/models. */
export const BACKING_MODEL_ID = "foundry-agent-model";

/** Reported in audit records. */
export const SERVER_VERSION = "1.0.0";

/**
 * Parse a comma-separated origin list. `*` (or an empty value) allows any origin.
 * Example: "http://localhost:3000,https://chat.example.com"
 */
function parseOrigins(raw: string | undefined): string[] {
  if (!raw) return ["*"];
  const origins = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return origins.length > 0 ? origins : ["*"];
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((v) => v === "true" || v === "1");

const configSchema = z.object({
  host: z.string().min(1).default("0.0.0.0"),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  logDir: z.string().min(1).default("logs"),
  corsOrigins: z.array(z.string()).default(["*"]),

  /** Upper bound for one agent run, from thread creation to the last event. */
  upstreamTimeoutMs: z.coerce.number().int().positive().default(120_000),

  sentryDsn: z.string().optional(),

  /** JSON audit trail of chat completions. */
  audit: z
    .object({
      enabled: booleanFlag,
      dir: z.string().min(1).default("audits"),
    })
    .default({ enabled: "true", dir: "audits" }),

  /** Service principal and agent used for every run. Presence is checked by validateRequiredEnvVars(). */
  azure: z.object({
    tenantId: z.string().default(""),
    clientId: z.string().default(""),
    clientSecret: z.string().default(""),
    endpoint: z.string().default(""),
    agentId: z.string().default(""),
  }),
});

export type Config = z.infer<typeof configSchema>;

/** Read settings from the environment. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const read = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value.trim() === "" ? undefined : value.trim();
  };

  return configSchema.parse({
    host: read("SERVER_HOST"),
    port: read("SERVER_PORT"),
    nodeEnv: read("NODE_ENV"),
    logLevel: read("LOG_LEVEL")?.toLowerCase(),
    logDir: read("LOG_DIR"),
    corsOrigins: parseOrigins(read("CORS_ORIGINS")),
    upstreamTimeoutMs: read("UPSTREAM_TIMEOUT_MS"),
    sentryDsn: read("SENTRY_DSN"),
    audit: {
      enabled: read("AUDIT_ENABLED")?.toLowerCase(),
      dir: read("AUDIT_DIR"),
    },
    azure: {
      tenantId: read("AZURE_TENANT_ID"),
      clientId: read("AZURE_CLIENT_ID"),
      clientSecret: read("AZURE_CLIENT_SECRET"),
      endpoint: read("AZURE_ENDPOINT"),
      agentId: read("AZURE_AGENT_ID"),
    },
  });
}
