import type { VaultEncrypter } from "../crypto/encrypter";
import type { VaultChange } from "../models";
import type { ExternalStore } from "../storage/external-store";
import type { InternalStore } from "../storage/internal-store";
import type { SubKeyIndex } from "../storage/sub-key-index";
import type { VaultError } from "../utils/errors";

/** Per-key settings accepted by every builder method. */
export interface KeyOptions {
  /** Dropped by `vault.clearRemovable()`. */
  removable?: boolean;
  /** Give the value its own file instead of a slot in `main.vault`. */
  useExternalStorage?: boolean;
  /** Delete a stored value that no longer decodes. Defaults to true. */
  removeOnDecodeFailure?: boolean;
}

/** What the vault remembers about each key it has handed out. */
export interface KeyDescriptor {
  readonly name: string;
  readonly storeName: string;
  readonly secure: boolean;
  readonly removable: boolean;
  readonly external: boolean;
}

/**
 * The services a key needs from the vault it was built by. Keys only see
 * this interface, so the vault module can depend on the key modules and not
 * the other way round.
 */
export interface KeyHost {
  /** Resolves once the vault is initialized; rejects if it cannot be. */
  ready(): Promise<void>;
  readonly internalStore: InternalStore;
  readonly externalStore: ExternalStore;
  /** @throws {CryptoError} when the vault was built without an encrypter. */
  requireEncrypter(): VaultEncrypter;
  report(error: VaultError): void;
  notify(change: VaultChange): void;
  /** Subscribes to every change in the vault. Returns the function that unsubscribes. */
  onChange(listener: (change: VaultChange) => void): () => void;
  changes(signal?: AbortSignal): AsyncGenerator<VaultChange>;
  /** The index of `parentName`'s children; sealed when the parent is secure. */
  subKeyIndex(parentName: string, secure: boolean): SubKeyIndex;
  /**
   * Records a key handed out under `descriptor.name`.
   * @throws {VaultError} when the name is already taken by a different kind of key.
   */
  registerKey(descriptor: KeyDescriptor): void;
  /** Runs `task` after every earlier task queued under `name` has settled. */
  exclusive<R>(name: string, task: () => Promise<R>): Promise<R>;
}
