import "dotenv/config";
import { AgentsClient } from "@azure/ai-agents";
import { ClientSecretCredential } from "@azure/identity";
import { serve } from "@hono/node-server";
import { createAzureTransport, FoundryAgentClient } from "./agent/foundry-client.js";
import { createApp } from "./api/app.js";
import { BACKING_MODEL_ID, loadConfig, SERVER_VERSION } from "./config/index.js";
import { createObservability, installProcessErrorHandlers } from "./observability/index.js";
import { validateRequiredEnvVars } from "./validate-env.js";

async function main(): Promise<void> {
  validateRequiredEnvVars();
  const config = loadConfig();
  const observability = createObservability(config, SERVER_VERSION);
  const { logger } = observability;
  installProcessErrorHandlers(observability);

  const credential = new ClientSecretCredential(config.azure.tenantId, config.azure.clientId, config.azure.clientSecret);
  const agentsClient = new AgentsClient(config.azure.endpoint, credential);

  // Fail fast on a wrong agent id or unusable credentials.
  const agent = await agentsClient.getAgent(config.azure.agentId);
  logger.info("Foundry Agent adapter initialized", { agentId: agent.id, agentName: agent.name });

  const agentClient = new FoundryAgentClient(createAzureTransport(agentsClient, config.azure.agentId), {
    logger,
    timeoutMs: config.upstreamTimeoutMs,
  });

  const app = createApp(
    { agentClient, observability, modelId: BACKING_MODEL_ID },
    { corsOrigins: config.corsOrigins },
  );

  logger.info(`Starting server on ${config.host}:${config.port}`);
  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      observability
        .close()
        .then(() => process.exit(0))
        .catch(() => process.exit(1));
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("Failed to start gateway:", err instanceof Error ? err.message : err);
  process.exit(1);
});
