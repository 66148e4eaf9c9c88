/**
 * SSE response writer for streaming chat completions.
 *
 * Frames are pulled from the source only when the client is ready for more,
 * so a slow reader holds the upstream run back instead of buffering it.
 * A client disconnect cancels the source.
 */

import type { Logger } from "../config/logger.js";

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
} as const;

export interface SSEStreamOptions {
  logger: Logger;
  headers?: Record<string, string>;
  /** Called when the client disconnects before the stream ended. */
  onCancel?: () => void;
  /** Called exactly once when the stream ends for any reason. */
  onClose?: (outcome: { frames: string[]; cancelled: boolean; error?: unknown }) => void;
}

/** Wrap an async sequence of SSE frames in a streaming HTTP 200 response. */
export function createSSEResponse(frames: AsyncIterable<string>, opts: SSEStreamOptions): Response {
  const { logger } = opts;
  const encoder = new TextEncoder();
  const iterator = frames[Symbol.asyncIterator]();
  const sent: string[] = [];
  let closed = false;

  const close = (outcome: { cancelled: boolean; error?: unknown }) => {
    if (closed) return;
    closed = true;
    opts.onClose?.({ frames: sent, ...outcome });
  };

  const body = new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const next = await iterator.next();
        // Cancelled while waiting on the source
        if (closed) return;
        if (next.done) {
          controller.close();
          close({ cancelled: false });
          return;
        }
        sent.push(next.value);
        controller.enqueue(encoder.encode(next.value));
      } catch (err) {
        if (closed) return;
        logger.error("SSE stream source error", { error: err instanceof Error ? err.message : String(err) });
        controller.error(err);
        close({ cancelled: false, error: err });
      }
    },

    async cancel() {
      if (closed) return;
      logger.info("Client disconnected mid-stream", { framesSent: sent.length });
      opts.onCancel?.();
      close({ cancelled: true });
      await iterator.return?.();
    },
  });

  return new Response(body, {
    status: 200,
    headers: { ...SSE_HEADERS, ...opts.headers },
  });
}
