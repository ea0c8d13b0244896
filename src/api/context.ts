// pattern: Functional Core
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { CommandService } from "../commands/service";
import type { SubscriptionStore } from "../store";

/**
 * tRPC context type passed to all procedures: the command service the
 * subscription procedures dispatch to, the store for status queries,
 * configuration and the logger.
 */
export type AppContext = {
  readonly commands: CommandService;
  readonly store: SubscriptionStore;
  readonly config: AppConfig;
  readonly logger: Logger;
};
