import { FileAuditWriter, NoopAuditSink } from "../audit/index.js";
import type { AuditSink } from "../audit/index.js";
import type { Config } from "../config/index.js";
import type { Logger } from "../config/logger.js";
import { createLogger } from "../config/logger.js";
import { captureError, flushSentry, initSentry } from "./sentry.js";

/**
 * Process-scoped observability handed to every request.
 *
 * Created once at startup, closed on shutdown. Nothing reads it from module state.
 */
export interface ObservabilityContext {
  logger: Logger;
  audit: AuditSink;
  captureError: typeof captureError;
  close(): Promise<void>;
}

export function createObservability(config: Config, serverVersion: string): ObservabilityContext {
  const logger = createLogger({ level: config.logLevel, logDir: config.logDir });
  initSentry(config.sentryDsn, config.nodeEnv);

  const audit: AuditSink = config.audit.enabled
    ? new FileAuditWriter({ dir: config.audit.dir, logger, serverVersion })
    : new NoopAuditSink();

  return {
    logger,
    audit,
    captureError,
    async close() {
      await flushSentry();
      await closeLogger(logger);
    },
  };
}

/** Resolve once every transport has drained. */
function closeLogger(logger: Logger): Promise<void> {
  return new Promise((resolve) => {
    logger.on("finish", () => resolve());
    logger.end();
  });
}
