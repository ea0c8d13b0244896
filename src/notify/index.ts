import type { Logger } from "pino";
import type { NotifierConfig } from "../config";
import { createMailgunNotifier } from "./mailgun";
import { createWebhookNotifier } from "./webhook";
import type { Notifier } from "./types";

/**
 * Builds the configured Notifier. The Mailgun key is read from the
 * environment rather than the config file.
 */
export function createNotifier(
  config: NotifierConfig,
  env: NodeJS.ProcessEnv,
  logger: Logger,
): Notifier {
  switch (config.kind) {
    case "webhook":
      return createWebhookNotifier(config.url, logger);
    case "mailgun": {
      const apiKey = env["MAILGUN_API_KEY"];
      if (!apiKey) {
        throw new Error("MAILGUN_API_KEY must be set to use the mailgun notifier");
      }
      return createMailgunNotifier(apiKey, config.domain, config.from, logger);
    }
  }
}

export { createMailgunNotifier, subjectFor } from "./mailgun";
export { createWebhookNotifier } from "./webhook";
export type { Notifier, SendResult } from "./types";
