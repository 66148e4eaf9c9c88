export { createObservability, type ObservabilityContext } from "./context.js";
export { captureError, flushSentry, initSentry } from "./sentry.js";
export { createProcessErrorHandlers, installProcessErrorHandlers } from "./process-handlers.js";
