/**
 * Time budget of one update pass.
 *
 * `signal` fires on the wall-clock timeout or when the parent signal
 * (shutdown) fires; it is handed to fetches, cursors and sends. `expired()`
 * reads the injected clock, which is what the pass checks between steps.
 */
export type Deadline = {
  readonly at: Date;
  readonly signal: AbortSignal;
  readonly expired: () => boolean;
};

export function createDeadline(
  timeoutMs: number,
  parent?: AbortSignal,
  now: () => Date = () => new Date(),
): Deadline {
  const at = new Date(now().getTime() + timeoutMs);
  const timeout = AbortSignal.timeout(timeoutMs);
  const signal = parent ? AbortSignal.any([parent, timeout]) : timeout;

  return {
    at,
    signal,
    expired: () => timeout.aborted || now().getTime() >= at.getTime(),
  };
}
