/**
 * Startup environment variable validation.
 *
 * Throws on missing Azure agent settings. Skipped in test environment.
 */
export const REQUIRED_AZURE_ENV_VARS = [
  "AZURE_TENANT_ID",
  "AZURE_CLIENT_ID",
  "AZURE_CLIENT_SECRET",
  "AZURE_ENDPOINT",
  "AZURE_AGENT_ID",
] as const;

export function validateRequiredEnvVars(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV === "test") return;

  const missing = REQUIRED_AZURE_ENV_VARS.filter((name) => !env[name]?.trim());

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const endpoint = env.AZURE_ENDPOINT?.trim() ?? "";
  if (!/^https?:\/\//.test(endpoint)) {
    throw new Error("AZURE_ENDPOINT must be an http(s) URL");
  }
}
