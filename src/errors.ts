export class FeedRelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "FeedRelayError";
  }
}

/**
 * Raised by the subscription store when the database rejects an operation.
 * Callers treat it as transient: the current command or feed fails, the
 * process carries on.
 */
export class StoreError extends FeedRelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "STORE_ERROR", details);
    this.name = "StoreError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
