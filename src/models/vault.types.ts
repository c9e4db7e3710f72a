import type { CodecRunner } from "../codec/codec-runner";
import type { VaultEncrypter } from "../crypto/encrypter";
import type { VaultError } from "../utils/errors";

/** Receives every recoverable fault. Never expected to throw. */
export type ErrorSink = (error: VaultError) => void;

export type Logger = Pick<Console, "warn" | "error">;

/**
 * Timer functions used for debouncing. Stores call through this object on
 * every schedule, so tests can swap in fake timers.
 */
export interface Clock {
  setTimeout(callback: () => void, ms: number): ReturnType<typeof setTimeout>;
  clearTimeout(handle: ReturnType<typeof setTimeout>): void;
}

export const systemClock: Clock = {
  setTimeout: (callback, ms) => setTimeout(callback, ms),
  clearTimeout: (handle) => clearTimeout(handle),
};

/** Emitted whenever the value behind a key name may have changed. */
export interface VaultChange {
  readonly name: string;
  /** True when the value was removed or cleared. */
  readonly removed: boolean;
}

export interface VaultOptions {
  /** Base directory. Either this or `resolveRoot` is required. */
  root?: string;
  /** Resolves the base directory lazily during `init()`. */
  resolveRoot?: () => string | Promise<string>;
  /** Folder created inside the base directory. Defaults to `vault`. */
  folderName?: string;
  /** Required as soon as a secure key is read or written. */
  encrypter?: VaultEncrypter;
  onError?: ErrorSink;
  /** Quiet period before the consolidated file is rewritten. Defaults to 150 ms. */
  debounceMs?: number;
  /** Where batch encode/decode runs. Defaults to an `InlineCodecRunner`. */
  codecRunner?: CodecRunner;
  clock?: Clock;
  /** Used when no `onError` sink is attached. Defaults to `console`. */
  logger?: Logger;
}
