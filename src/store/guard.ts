import { StoreError, errorMessage } from "../errors";

/**
 * Runs a database operation, rethrowing driver errors as `StoreError`.
 */
export function guardStore<T>(
  operation: string,
  fn: () => T,
  details?: Record<string, unknown>,
): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof StoreError) throw err;
    throw new StoreError(`${operation} failed: ${errorMessage(err)}`, {
      operation,
      ...details,
    });
  }
}
