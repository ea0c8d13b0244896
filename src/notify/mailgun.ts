// pattern: Imperative Shell
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";
import type { Notifier, SendResult } from "./types";

const MAX_SUBJECT_LENGTH = 120;

/**
 * First line of the message, trimmed to a sensible subject length.
 */
export function subjectFor(text: string): string {
  const firstLine = text.split("\n", 1)[0]?.trim() ?? "";
  if (firstLine === "") return "New feed item";
  return firstLine.length > MAX_SUBJECT_LENGTH
    ? `${firstLine.slice(0, MAX_SUBJECT_LENGTH - 1)}…`
    : firstLine;
}

const ABORTED: SendResult = { success: false, error: "aborted" };

/**
 * Resolves to `ABORTED` once `signal` fires. The returned `dispose` removes
 * the listener when the send settles first.
 */
function abortResult(signal: AbortSignal): {
  readonly aborted: Promise<SendResult>;
  readonly dispose: () => void;
} {
  let onAbort: () => void = () => undefined;
  const aborted = new Promise<SendResult>((resolve) => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { aborted, dispose: () => signal.removeEventListener("abort", onAbort) };
}

/**
 * Creates a Mailgun-backed Notifier. Destination ids are e-mail addresses.
 *
 * mailgun.js takes no abort signal, so a send is raced against the caller's
 * signal; the client-side `timeoutMs` bounds requests sent without one.
 *
 * @param apiKey - Mailgun API key for authentication
 * @param domain - Mailgun sending domain
 * @param from - Sender address shown to recipients
 */
export function createMailgunNotifier(
  apiKey: string,
  domain: string,
  from: string,
  logger: Logger,
  timeoutMs = 15000,
): Notifier {
  const mailgun = new Mailgun(FormData);
  const mg = mailgun.client({ username: "api", key: apiKey, timeout: timeoutMs });

  const deliver = async (destinationId: string, text: string): Promise<SendResult> => {
    try {
      const result = await mg.messages.create(domain, {
        from,
        to: [destinationId],
        subject: subjectFor(text),
        text,
      });

      logger.debug({ messageId: result.id, destinationId }, "mail delivery sent");
      return { success: true };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ destinationId, error: message }, "mail delivery failed");
      return { success: false, error: message };
    }
  };

  return {
    async send(destinationId, text, signal): Promise<SendResult> {
      if (!signal) return deliver(destinationId, text);
      if (signal.aborted) return ABORTED;

      const { aborted, dispose } = abortResult(signal);
      try {
        const result = await Promise.race([deliver(destinationId, text), aborted]);
        if (result === ABORTED) {
          logger.warn({ destinationId }, "mail delivery aborted");
        }
        return result;
      } finally {
        dispose();
      }
    },
  };
}
