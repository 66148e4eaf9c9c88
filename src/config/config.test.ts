import { describe, expect, it } from "vitest";
import { loadConfig } from "./index.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      host: "0.0.0.0",
      port: 8000,
      nodeEnv: "development",
      logLevel: "info",
      logDir: "logs",
      corsOrigins: ["*"],
      upstreamTimeoutMs: 120000,
      sentryDsn: undefined,
      audit: { enabled: true, dir: "audits" },
      azure: { tenantId: "", clientId: "", clientSecret: "", endpoint: "", agentId: "" },
    });
  });

  it("reads server, logging and azure settings", () => {
    const config = loadConfig({
      SERVER_HOST: "127.0.0.1",
      SERVER_PORT: "9000",
      NODE_ENV: "production",
      LOG_LEVEL: "DEBUG",
      LOG_DIR: "/var/log/gateway",
      UPSTREAM_TIMEOUT_MS: "30000",
      AZURE_TENANT_ID: "tenant",
      AZURE_CLIENT_ID: "client",
      AZURE_CLIENT_SECRET: "test-secret",
      AZURE_ENDPOINT: "https://example.services.ai.azure.com/api/projects/demo",
      AZURE_AGENT_ID: "asst_test",
    });

    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(9000);
    expect(config.nodeEnv).toBe("production");
    expect(config.logLevel).toBe("debug");
    expect(config.logDir).toBe("/var/log/gateway");
    expect(config.upstreamTimeoutMs).toBe(30000);
    expect(config.azure).toEqual({
      tenantId: "tenant",
      clientId: "client",
      clientSecret: "test-secret",
      endpoint: "https://example.services.ai.azure.com/api/projects/demo",
      agentId: "asst_test",
    });
  });

  it("parses audit flags", () => {
    expect(loadConfig({ AUDIT_ENABLED: "false" }).audit.enabled).toBe(false);
    expect(loadConfig({ AUDIT_ENABLED: "0" }).audit.enabled).toBe(false);
    expect(loadConfig({ AUDIT_ENABLED: "TRUE", AUDIT_DIR: "trail" }).audit).toEqual({ enabled: true, dir: "trail" });
  });

  it("splits CORS origins", () => {
    expect(loadConfig({ CORS_ORIGINS: "http://a.test, https://b.test,," }).corsOrigins).toEqual([
      "http://a.test",
      "https://b.test",
    ]);
    expect(loadConfig({ CORS_ORIGINS: " , " }).corsOrigins).toEqual(["*"]);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ SERVER_PORT: "  ", LOG_LEVEL: "" }).port).toBe(8000);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ SERVER_PORT: "not-a-port" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ AUDIT_ENABLED: "maybe" })).toThrow();
  });
});
