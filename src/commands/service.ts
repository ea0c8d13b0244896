// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { FeedSource } from "../source/types";
import { collect, isFetchableUrl } from "../store";
import type { Feed, QuotaLimit, SubscriptionStore } from "../store";

export type SubscribeInput = {
  readonly ownerId: string;
  readonly destinationId: string;
  readonly url: string;
};

export type UnsubscribeInput = {
  readonly ownerId: string;
  readonly destinationId: string;
  readonly position: number;
};

type Refusal =
  | { readonly status: "not_allowed" }
  | { readonly status: "rate_limited" };

export type SubscribeResult =
  | { readonly status: "subscribed"; readonly feed: Feed }
  | { readonly status: "already_subscribed"; readonly feed: Feed }
  | { readonly status: "quota_exceeded"; readonly limit: QuotaLimit }
  | { readonly status: "invalid_url" }
  | { readonly status: "fetch_failed"; readonly error: string }
  | Refusal;

export type UnsubscribeResult =
  | { readonly status: "removed"; readonly feed: Feed }
  | { readonly status: "not_found" }
  | Refusal;

export type SubscriptionListing = {
  readonly position: number;
  readonly title: string;
  readonly url: string;
};

export type CommandService = {
  readonly subscribe: (input: SubscribeInput) => Promise<SubscribeResult>;
  readonly listSubscriptions: (destinationId: string) => Promise<Array<SubscriptionListing>>;
  readonly unsubscribe: (input: UnsubscribeInput) => Promise<UnsubscribeResult>;
};

export type CommandDeps = {
  readonly store: SubscriptionStore;
  readonly source: FeedSource;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly now?: () => Date;
};

/**
 * The subscribe / list / unsubscribe commands a transport dispatches to.
 *
 * Mutating commands are checked against the allow-list and the per-owner
 * rate limit, then written to the request log. Store failures propagate as
 * `StoreError`.
 */
export function createCommandService(deps: CommandDeps): CommandService {
  const { store, source, config, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const { allowList, rateLimit } = config.commands;

  const admit = (ownerId: string, name: string, text: string): Refusal | null => {
    if (allowList.length > 0 && !allowList.includes(ownerId)) {
      logger.warn({ ownerId, command: name }, "command from owner not on allow-list");
      return { status: "not_allowed" };
    }

    const at = now();
    if (rateLimit.maxRequests > 0) {
      const since = new Date(at.getTime() - rateLimit.windowMinutes * 60 * 1000);
      const recent = store.countRecentRequests(ownerId, since);
      if (recent >= rateLimit.maxRequests) {
        logger.warn({ ownerId, command: name, recent }, "owner rate limited");
        return { status: "rate_limited" };
      }
    }

    store.recordRequest({ ownerId, name, text, at });
    return null;
  };

  return {
    async subscribe(input) {
      const refusal = admit(input.ownerId, "subscribe", input.url);
      if (refusal) return refusal;

      const url = input.url.trim();
      if (!isFetchableUrl(url)) return { status: "invalid_url" };

      let title: string;
      const known = store.lookupFeedByUrl(url);
      if (known) {
        title = known.title;
      } else {
        const fetched = await source.fetch(
          url,
          AbortSignal.timeout(config.commands.fetchTimeoutSeconds * 1000),
        );
        if (!fetched.success) {
          logger.info({ url, error: fetched.error }, "new feed could not be fetched");
          return { status: "fetch_failed", error: fetched.error };
        }
        title = fetched.document.title;
      }

      const result = store.addSubscription({
        ownerId: input.ownerId,
        destinationId: input.destinationId,
        url,
        title,
      });

      if (result.status === "quota_exceeded") {
        logger.info(
          { ownerId: input.ownerId, destinationId: input.destinationId, limit: result.limit },
          "subscription declined by quota",
        );
      } else {
        logger.info(
          { ownerId: input.ownerId, destinationId: input.destinationId, feedId: result.feed.id, status: result.status },
          "subscription added",
        );
      }
      return result;
    },

    async listSubscriptions(destinationId) {
      const cursor = store.listSubscriptions(destinationId);
      const feeds = await collect(cursor);
      if (cursor.error) {
        logger.warn({ destinationId }, "subscription listing ended early");
      }
      return feeds.map((feed) => ({
        position: feed.position,
        title: feed.title,
        url: feed.url,
      }));
    },

    async unsubscribe(input) {
      const refusal = admit(input.ownerId, "unsubscribe", String(input.position));
      if (refusal) return refusal;

      const feed = store.removeSubscription(input.destinationId, input.position);
      if (!feed) return { status: "not_found" };

      logger.info(
        { destinationId: input.destinationId, position: input.position, feedId: feed.id },
        "subscription removed",
      );
      return { status: "removed", feed };
    },
  };
}
