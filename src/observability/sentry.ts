import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize Sentry SDK. Call before the server starts accepting requests.
 *
 * If `dsn` is absent, Sentry stays disabled and capture calls are no-ops.
 */
export function initSentry(dsn: string | undefined, environment = "development"): void {
  if (!dsn) {
    enabled = false;
    return;
  }

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Request bodies carry user prompts
    sendDefaultPii: false,
  });
  enabled = true;
}

/** Capture an exception with the route and request id it happened on. */
export function captureError(
  error: unknown,
  context?: {
    route?: string;
    requestId?: string;
    source?: string;
    extra?: Record<string, unknown>;
  },
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.route && { route: context.route }),
      ...(context?.requestId && { requestId: context.requestId }),
      ...(context?.source && { source: context.source }),
    },
    extra: context?.extra,
  });
}

/** Flush pending events before the process exits. */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
