/**
 * Discriminated union result type for a delivery attempt.
 */
export type SendResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: string };

/**
 * Delivers one text message to a destination. Never throws: failures are
 * returned in the result.
 */
export type Notifier = {
  readonly send: (
    destinationId: string,
    text: string,
    signal?: AbortSignal,
  ) => Promise<SendResult>;
};
