// pattern: Functional Core
import type { QuotaLimits } from "../config";
import type { QuotaCounts, QuotaLimit } from "./types";

function reached(count: number, limit: number): boolean {
  return limit !== 0 && count >= limit;
}

/**
 * Returns the highest-priority quota a new subscription would break, or
 * null when it fits. A limit of 0 never declines.
 */
export function evaluateQuota(
  counts: QuotaCounts,
  limits: QuotaLimits,
): QuotaLimit | null {
  if (reached(counts.destination, limits.maxFeedsPerDestination)) {
    return "destination";
  }
  if (reached(counts.ownerTotal, limits.maxTotalFeedsByOwner)) {
    return "owner_total";
  }
  if (reached(counts.ownerActive, limits.maxActiveFeedsByOwner)) {
    return "owner_active";
  }
  return null;
}
