// pattern: Imperative Shell
import type { Logger } from "pino";
import type { Notifier, SendResult } from "./types";

/**
 * Creates a Notifier that POSTs `{ destinationId, text }` as JSON to a
 * single endpoint, which routes the message to the destination.
 */
export function createWebhookNotifier(
  url: string,
  logger: Logger,
  timeoutMs = 15000,
): Notifier {
  return {
    async send(destinationId, text, signal): Promise<SendResult> {
      const timeout = AbortSignal.timeout(timeoutMs);

      try {
        const response = await fetch(url, {
          method: "POST",
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ destinationId, text }),
        });

        if (!response.ok) {
          const error = `HTTP ${response.status}: ${response.statusText}`;
          logger.warn({ destinationId, error }, "webhook delivery rejected");
          return { success: false, error };
        }

        logger.debug({ destinationId }, "webhook delivery sent");
        return { success: true };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ destinationId, error: message }, "webhook delivery failed");
        return { success: false, error: message };
      }
    },
  };
}
