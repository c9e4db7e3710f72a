import { VaultError } from "./errors";

/**
 * Digs into an error object to find the most useful, specific error message.
 * Vault errors get the offending key and the underlying cause appended, since
 * "Failed to write" alone rarely tells you which file or why.
 *
 * @param error The error object, which could be anything.
 * @returns A readable message.
 */
export function getGroundedError(error: unknown): string {
  if (error instanceof VaultError) {
    const parts = [error.message];
    if (error.key !== undefined) {
      parts.push(`(key: ${error.key})`);
    }
    if (error.cause !== undefined) {
      parts.push(`caused by: ${getGroundedError(error.cause)}`);
    }
    return parts.join(" ");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
