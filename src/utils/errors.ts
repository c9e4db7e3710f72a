export interface VaultErrorOptions {
  /** Logical name of the key involved, when there is one. */
  key?: string;
  cause?: unknown;
}

/**
 * Base class of every fault the vault reports. The `key` field names the
 * offending key so an error sink can tell which value became unavailable.
 */
export class VaultError extends Error {
  /** Set by the key that hit the error; store-level errors may carry a file name instead. */
  key?: string;

  constructor(message: string, options: VaultErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "VaultError";
    this.key = options.key;
  }
}

/** The root folder or consolidated file could not be read or decoded at startup. */
export class InitializationError extends VaultError {
  constructor(message: string, options?: VaultErrorOptions) {
    super(message, options);
    this.name = "InitializationError";
  }
}

/** A name over the length limit, or a value the codec cannot serialize. */
export class EncodeError extends VaultError {
  constructor(message: string, options?: VaultErrorOptions) {
    super(message, options);
    this.name = "EncodeError";
  }
}

/** One record is corrupt: truncated, not UTF-8, not JSON, or not its tagged type. */
export class DecodeError extends VaultError {
  constructor(message: string, options?: VaultErrorOptions) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class IOError extends VaultError {
  constructor(message: string, options?: VaultErrorOptions) {
    super(message, options);
    this.name = "IOError";
  }
}

/** Encrypting or decrypting a secure value failed. */
export class CryptoError extends VaultError {
  constructor(message: string, options?: VaultErrorOptions) {
    super(message, options);
    this.name = "CryptoError";
  }
}

/** Node's fs errors carry a string `code`; this reads it without trusting the shape. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Attributes a failure to the logical key `key`. Vault errors keep their
 * class; anything else becomes a plain `VaultError` around it.
 */
export function asKeyError(error: unknown, key: string): VaultError {
  if (error instanceof VaultError) {
    error.key = key;
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new VaultError(message, { key, cause: error });
}
