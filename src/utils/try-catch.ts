import type { Result } from "../models";

function toError(caughtError: unknown): Error {
  if (caughtError instanceof Error) {
    return caughtError;
  }
  return new Error(String(caughtError));
}

/**
 * Runs a promise-returning function and folds the outcome into a `Result`.
 * This is how key operations surface failures to callers without throwing.
 * Errors keep their class, so callers can branch on `VaultError` subclasses.
 *
 * @param promiseFn The core logic.
 * @returns A Promise that always resolves to a `Result<T>` object.
 */
export async function tryCatch<T>(promiseFn: () => Promise<T>): Promise<Result<T>> {
  try {
    const data = await promiseFn();
    return { success: true, data, error: null };
  } catch (caughtError) {
    return { success: false, data: null, error: toError(caughtError) };
  }
}
