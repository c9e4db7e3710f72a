import { EventEmitter } from "node:events";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { InlineCodecRunner, type CodecRunner } from "../codec/codec-runner";
import { FLAG_SECURE } from "../codec/entry-codec";
import type { VaultEncrypter } from "../crypto/encrypter";
import type { KeyDescriptor, KeyHost, KeyOptions } from "../keys/interfaces";
import { KeyBuilder } from "../keys/key-builder";
import type { KeyCodec } from "../keys/key-codecs";
import { openEnvelope } from "../keys/secure-envelope";
import { PlainVaultKey, SecureVaultKey, type VaultKey } from "../keys/vault-key";
import {
  ValueType,
  type Entry,
  type ErrorSink,
  type Header,
  type Logger,
  type VaultChange,
  type VaultOptions,
} from "../models";
import { removeFile } from "../storage/atomic-file";
import { ExternalStore } from "../storage/external-store";
import { InternalStore, MAIN_FILE_NAME } from "../storage/internal-store";
import { KeyedQueue } from "../storage/keyed-queue";
import { SubKeyIndex } from "../storage/sub-key-index";
import {
  CryptoError,
  InitializationError,
  IOError,
  VaultError,
} from "../utils/errors";
import { getGroundedError } from "../utils/error-parser";

export const DEFAULT_FOLDER_NAME = "vault";

const LOG_PREFIX = "[Vault]";

/**
 * Q: What is a Vault?
 * A: The one object an application talks to. It owns both stores, hands out
 *    typed keys through `vault.key` and `vault.secure`, and tells listeners
 *    whenever a value may have changed. Small values live together in
 *    `main.vault`; keys built with `useExternalStorage` get a file each.
 *
 * Q: Do I have to call `init()`?
 * A: No. Every key operation awaits it. Call it yourself to find out early
 *    whether the folder is usable.
 */
export class Vault {
  public readonly key: KeyBuilder;
  public readonly secure: KeyBuilder;

  private readonly internalStore: InternalStore;
  private readonly externalStore: ExternalStore;
  private readonly codecRunner: CodecRunner;
  private readonly encrypter: VaultEncrypter | null;
  private readonly logger: Logger;
  private readonly onError: ErrorSink | null;
  private readonly events = new EventEmitter();
  private readonly registry = new Map<string, KeyDescriptor>();
  private readonly indexes = new Map<string, SubKeyIndex>();
  private readonly updates = new KeyedQueue();
  private readonly host: KeyHost;
  private initPromise: Promise<void> | null = null;
  private dir: string | null = null;
  private disposed = false;

  constructor(private readonly options: VaultOptions) {
    if (options.root === undefined && options.resolveRoot === undefined) {
      throw new VaultError("Vault needs either `root` or `resolveRoot`");
    }

    this.codecRunner = options.codecRunner ?? new InlineCodecRunner();
    this.encrypter = options.encrypter ?? null;
    this.logger = options.logger ?? console;
    this.onError = options.onError ?? null;
    this.events.setMaxListeners(0);

    const report: ErrorSink = (error) => this.report(error);
    this.internalStore = new InternalStore({
      codecRunner: this.codecRunner,
      report,
      debounceMs: options.debounceMs,
      clock: options.clock,
    });
    this.externalStore = new ExternalStore({ report });

    this.host = {
      ready: () => this.init(),
      internalStore: this.internalStore,
      externalStore: this.externalStore,
      requireEncrypter: () => this.requireEncrypter(),
      report,
      notify: (change) => this.notify(change),
      onChange: (listener) => this.onChange(listener),
      changes: (signal) => this.changes(signal),
      subKeyIndex: (parentName, secure) => this.subKeyIndex(parentName, secure),
      registerKey: (descriptor) => this.registerKey(descriptor),
      exclusive: (name, task) => this.updates.run(name, task),
    };

    this.key = new KeyBuilder((name, codec, keyOptions) =>
      this.createKey(false, name, codec, keyOptions),
    );
    this.secure = new KeyBuilder((name, codec, keyOptions) =>
      this.createKey(true, name, codec, keyOptions),
    );
  }

  /** The vault folder, once `init()` has resolved it. */
  public get directory(): string | null {
    return this.dir;
  }

  /**
   * Resolves the folder, prepares the encrypter and loads both stores.
   * Concurrent callers share one attempt; a failed attempt can be retried.
   */
  public init(): Promise<void> {
    if (this.disposed) {
      return Promise.reject(new VaultError("Vault has been disposed"));
    }
    this.initPromise ??= this.initialize().catch((error: unknown) => {
      this.initPromise = null;
      throw error;
    });
    return this.initPromise;
  }

  private async initialize(): Promise<void> {
    let dir: string;
    try {
      const root = this.options.root ?? (await this.resolveRoot());
      dir = path.join(root, this.options.folderName ?? DEFAULT_FOLDER_NAME);
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw this.initFailure(
        error,
        new InitializationError("Cannot prepare the vault folder", { cause: error }),
      );
    }

    if (this.encrypter) {
      try {
        await this.encrypter.init();
      } catch (error) {
        throw this.initFailure(
          error,
          new CryptoError("Encrypter failed to initialize", { cause: error }),
        );
      }
    }

    await this.internalStore.init(dir);
    try {
      await this.externalStore.init(dir);
    } catch (error) {
      throw this.initFailure(
        error,
        new InitializationError("Cannot open external storage", { cause: error }),
      );
    }
    this.dir = dir;
  }

  /** Reports what stopped `init()`; vault errors are kept, anything else becomes `fallback`. */
  private initFailure(error: unknown, fallback: VaultError): VaultError {
    const failure = error instanceof VaultError ? error : fallback;
    this.report(failure);
    return failure;
  }

  private async resolveRoot(): Promise<string> {
    const { resolveRoot } = this.options;
    if (!resolveRoot) {
      throw new InitializationError("No root directory configured");
    }
    return resolveRoot();
  }

  /**
   * Removes every value from both stores, removable or not, and every
   * sub-key index. External files go first; the first one that cannot be
   * deleted is thrown and nothing after it is touched.
   */
  public async clear(): Promise<void> {
    await this.init();
    const dir = this.requireDir();
    const names = new Set([...this.registry.keys(), ...(await this.keys())]);

    await this.externalStore.clear();
    this.internalStore.clear();

    try {
      for (const index of this.indexes.values()) await index.clear();
      await this.removeStrayIndexFiles(dir);
    } catch (error) {
      const failure =
        error instanceof VaultError
          ? error
          : new IOError("Cannot clear sub-key indexes", { cause: error });
      this.report(failure);
      throw failure;
    }

    for (const name of names) this.notify({ name, removed: true });
  }

  /** Sub-key index files of parents this process never opened. */
  private async removeStrayIndexFiles(dir: string): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const strays = entries.filter(
      (entry) => entry.isFile() && !entry.name.startsWith(MAIN_FILE_NAME),
    );
    for (const stray of strays) {
      try {
        await removeFile(path.join(dir, stray.name));
      } catch (error) {
        throw new IOError(`Cannot remove ${stray.name}`, { cause: error });
      }
    }
  }

  /**
   * Removes every value flagged removable, reading only flags. Returns the
   * names removed; a secure value is named only when a key for it was built
   * in this process, otherwise its slot name is returned.
   */
  public async clearRemovable(): Promise<string[]> {
    await this.init();
    const removedSlots = [
      ...this.internalStore.clearRemovable(),
      ...(await this.externalStore.clearRemovable()),
    ];

    const namesBySlot = new Map<string, string>();
    for (const descriptor of this.registry.values()) {
      namesBySlot.set(descriptor.storeName, descriptor.name);
    }
    const removed = removedSlots.map((slot) => namesBySlot.get(slot) ?? slot);

    const changed = new Set(removed);
    for (const descriptor of this.registry.values()) {
      if (descriptor.removable) changed.add(descriptor.name);
    }
    for (const name of changed) this.notify({ name, removed: true });

    return removed;
  }

  /**
   * Logical names of every stored value. Secure names are recovered by
   * decrypting; one that cannot be decrypted is reported and left out.
   */
  public async keys(): Promise<string[]> {
    await this.init();
    const entries = [
      ...this.internalStore.getEntries().values(),
      ...(await this.externalStore.getEntries()).values(),
    ];

    const names = new Set<string>();
    for (const entry of entries) {
      const name = await this.logicalName(entry);
      if (name !== null) names.add(name);
    }
    return [...names];
  }

  private async logicalName(entry: Entry): Promise<string | null> {
    if (!(entry.flags & FLAG_SECURE)) return entry.name;

    try {
      if (entry.type !== ValueType.String) {
        throw new CryptoError(`Secure slot holds ${ValueType[entry.type]}, not ciphertext`);
      }
      return (await openEnvelope(this.requireEncrypter(), entry.value)).k;
    } catch (error) {
      const failure =
        error instanceof CryptoError
          ? error
          : new CryptoError("Cannot recover a secure key name", { cause: error });
      failure.key = entry.storeName;
      this.report(failure);
      return null;
    }
  }

  /** Framing metadata of every stored value, without decoding any payload. */
  public async headers(): Promise<Header[]> {
    await this.init();
    return [...this.internalStore.headers(), ...(await this.externalStore.headers())];
  }

  /** Subscribes to changes. Returns the function that unsubscribes. */
  public onChange(listener: (change: VaultChange) => void): () => void {
    this.events.on("change", listener);
    return () => {
      this.events.off("change", listener);
    };
  }

  /**
   * Q: Why an `async *` generator as well as `onChange`?
   * A: So a consumer can `for await` over changes. The stream buffers what
   *    arrives between iterations and ends when `signal` aborts or the vault
   *    is disposed.
   */
  public async *changes(signal?: AbortSignal): AsyncGenerator<VaultChange> {
    const buffer: VaultChange[] = [];
    let wake: (() => void) | null = null;
    const unsubscribe = this.onChange((change) => {
      buffer.push(change);
      wake?.();
    });
    const stop = () => wake?.();
    signal?.addEventListener("abort", stop);
    this.events.on("dispose", stop);

    try {
      while (!signal?.aborted && !this.disposed) {
        const next = buffer.shift();
        if (next) {
          yield next;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      unsubscribe();
      signal?.removeEventListener("abort", stop);
      this.events.off("dispose", stop);
    }
  }

  /** Writes everything that is waiting on a debounce. */
  public async flush(): Promise<void> {
    await Promise.all([
      this.internalStore.flush(),
      this.externalStore.idle(),
      ...[...this.indexes.values()].map((index) => index.flush()),
    ]);
  }

  /**
   * Flushes, stops every timer, ends open change streams and closes the
   * codec runner. The vault cannot be used afterwards.
   */
  public async dispose(): Promise<void> {
    if (this.disposed) return;
    if (this.initPromise) {
      await this.initPromise.catch(() => undefined);
      await this.internalStore.dispose();
      await this.externalStore.idle();
      await Promise.all([...this.indexes.values()].map((index) => index.dispose()));
    }
    this.disposed = true;
    this.events.emit("dispose");
    this.events.removeAllListeners();
    await this.codecRunner.close();
  }

  private createKey<T>(
    secure: boolean,
    name: string,
    codec: KeyCodec<T>,
    options: KeyOptions,
  ): VaultKey<T> {
    if (name.length === 0) {
      throw new VaultError("Key names cannot be empty");
    }
    const key = secure
      ? new SecureVaultKey(this.host, name, codec, options)
      : new PlainVaultKey(this.host, name, codec, options);
    this.registerKey(key.descriptor);
    return key;
  }

  private registerKey(descriptor: KeyDescriptor): void {
    const existing = this.registry.get(descriptor.name);
    if (
      existing &&
      (existing.secure !== descriptor.secure ||
        existing.external !== descriptor.external ||
        existing.removable !== descriptor.removable)
    ) {
      throw new VaultError(
        `Key "${descriptor.name}" already exists as a ${describeKey(existing)} key`,
        { key: descriptor.name },
      );
    }
    this.registry.set(descriptor.name, descriptor);
  }

  private subKeyIndex(parentName: string, secure: boolean): SubKeyIndex {
    let index = this.indexes.get(parentName);
    if (!index) {
      index = new SubKeyIndex(parentName, {
        resolveDir: async () => {
          await this.init();
          return this.requireDir();
        },
        report: (error) => this.report(error),
        debounceMs: this.options.debounceMs,
        clock: this.options.clock,
        encrypter: secure ? () => this.requireEncrypter() : undefined,
      });
      this.indexes.set(parentName, index);
    }
    return index;
  }

  private requireDir(): string {
    if (this.dir === null) {
      throw new VaultError("Vault is not initialized");
    }
    return this.dir;
  }

  private requireEncrypter(): VaultEncrypter {
    if (!this.encrypter) {
      throw new CryptoError("Secure keys need an encrypter; pass one in VaultOptions");
    }
    return this.encrypter;
  }

  private notify(change: VaultChange): void {
    try {
      this.events.emit("change", change);
    } catch (error) {
      this.report(new VaultError("A change listener threw", { key: change.name, cause: error }));
    }
  }

  private report(error: VaultError): void {
    if (this.onError) {
      this.onError(error);
      return;
    }
    const message = `${LOG_PREFIX} ${error.name}: ${getGroundedError(error)}`;
    if (error instanceof IOError || error instanceof InitializationError) {
      this.logger.error(message);
    } else {
      this.logger.warn(message);
    }
  }
}

function describeKey(descriptor: KeyDescriptor): string {
  const kind = descriptor.secure ? "secure" : "plain";
  const placement = descriptor.external ? "external" : "internal";
  return `${kind} ${placement}${descriptor.removable ? " removable" : ""}`;
}
