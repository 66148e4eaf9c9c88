import type { ObservabilityContext } from "./context.js";

type Handlers = {
  unhandledRejection: (reason: unknown) => void;
  uncaughtException: (err: Error, origin: string) => void;
};

/**
 * Process-level handlers. Both log and report; only an uncaught exception
 * ends the process, since it leaves state undefined.
 */
export function createProcessErrorHandlers(
  observability: Pick<ObservabilityContext, "logger" | "captureError">,
  exit: (code: number) => void = (code) => process.exit(code),
): Handlers {
  const { logger, captureError } = observability;
  return {
    unhandledRejection(reason) {
      logger.error("Unhandled promise rejection", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
      });
      captureError(reason instanceof Error ? reason : new Error(String(reason)), { source: "unhandledRejection" });
    },
    uncaughtException(err, origin) {
      logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
      captureError(err, { source: "uncaughtException", extra: { origin } });
      exit(1);
    },
  };
}

export function installProcessErrorHandlers(observability: Pick<ObservabilityContext, "logger" | "captureError">): void {
  const handlers = createProcessErrorHandlers(observability);
  process.on("unhandledRejection", handlers.unhandledRejection);
  process.on("uncaughtException", handlers.uncaughtException);
}
