import { hashKeyName } from "../codec/bytes";
import { FLAG_REMOVABLE, FLAG_SECURE } from "../codec/entry-codec";
import { ValueType, type Entry, type Result, type WireValue } from "../models";
import type { SubKeyIndex } from "../storage/sub-key-index";
import { asKeyError, CryptoError, DecodeError, VaultError } from "../utils/errors";
import { tryCatch } from "../utils/try-catch";
import type { KeyDescriptor, KeyHost, KeyOptions } from "./interfaces";
import type { KeyCodec } from "./key-codecs";
import { openEnvelope, sealEnvelope } from "./secure-envelope";

/** Set on keys made with `child()`: where the key is listed as a sub-key. */
export interface ParentLink {
  name: string;
  suffix: string;
}

/**
 * A typed handle on one stored value. Handles hold no value themselves; two
 * handles with the same name read and write the same slot.
 *
 * Reads never throw: a missing, undecodable or undecryptable value reads as
 * `null` and the failure goes to the vault's error sink. Writes report the
 * same way and hand the failure back as a `Result`.
 */
export abstract class VaultKey<T> {
  public abstract readonly secure: boolean;
  /** Name of the slot on disk. */
  public abstract readonly storeName: string;
  public readonly removable: boolean;
  public readonly useExternalStorage: boolean;
  protected readonly removeOnDecodeFailure: boolean;

  constructor(
    protected readonly host: KeyHost,
    public readonly name: string,
    protected readonly codec: KeyCodec<T>,
    protected readonly options: KeyOptions = {},
    protected readonly parent: ParentLink | null = null,
  ) {
    this.removable = options.removable ?? false;
    this.useExternalStorage = options.useExternalStorage ?? false;
    this.removeOnDecodeFailure = options.removeOnDecodeFailure ?? true;
  }

  /** Turns a wire value into what is stored: itself, or an encrypted envelope. */
  protected abstract seal(wire: WireValue): Promise<WireValue>;
  protected abstract unseal(entry: Entry): Promise<WireValue>;
  protected abstract spawn<C>(name: string, codec: KeyCodec<C>, parent: ParentLink): VaultKey<C>;
  public abstract readSync(): T | null;

  public get flags(): number {
    return (this.removable ? FLAG_REMOVABLE : 0) | (this.secure ? FLAG_SECURE : 0);
  }

  public get descriptor(): KeyDescriptor {
    return {
      name: this.name,
      storeName: this.storeName,
      secure: this.secure,
      removable: this.removable,
      external: this.useExternalStorage,
    };
  }

  /** Names of the children written through `child()`. */
  public get subKeys(): SubKeyIndex {
    return this.host.subKeyIndex(this.name, this.secure);
  }

  public async read(): Promise<T | null> {
    try {
      await this.host.ready();
      const entry = await this.loadEntry();
      if (!entry) return null;
      return this.decodeWire(await this.unseal(entry));
    } catch (error) {
      const failure = asKeyError(error, this.name);
      this.host.report(failure);
      if (failure instanceof DecodeError && this.removeOnDecodeFailure) {
        await this.discard();
      }
      return null;
    }
  }

  public async readOrDefault(fallback: T): Promise<T> {
    return (await this.read()) ?? fallback;
  }

  /** Stores `value`; `null` removes the key. */
  public write(value: T | null): Promise<Result<void>> {
    return this.guard(() => this.host.exclusive(this.name, () => this.persist(value)));
  }

  /**
   * Reads, transforms and writes back. Writes, removals and updates of one
   * key run one at a time in call order, so an update sees the result of
   * everything issued before it.
   */
  public update(fn: (current: T | null) => T | null | Promise<T | null>): Promise<Result<void>> {
    return this.guard(() =>
      this.host.exclusive(this.name, async () => this.persist(await fn(await this.read()))),
    );
  }

  public remove(): Promise<Result<void>> {
    return this.guard(() =>
      this.host.exclusive(this.name, async () => {
        await this.host.ready();
        await this.erase();
      }),
    );
  }

  /**
   * Calls `listener` with the current value each time this key is written,
   * removed or cleared; removals deliver `null`. Returns the function that
   * unsubscribes.
   */
  public onChange(listener: (value: T | null) => void): () => void {
    const deliver = async (removed: boolean) => {
      const value = removed ? null : await this.read();
      try {
        listener(value);
      } catch (error) {
        this.host.report(new VaultError("A key listener threw", { key: this.name, cause: error }));
      }
    };
    return this.host.onChange((change) => {
      if (change.name === this.name) void deliver(change.removed);
    });
  }

  /** The values of this key as they change, until `signal` aborts or the vault is disposed. */
  public async *stream(signal?: AbortSignal): AsyncGenerator<T | null> {
    for await (const change of this.host.changes(signal)) {
      if (change.name !== this.name) continue;
      yield change.removed ? null : await this.read();
    }
  }

  public exists(): Promise<Result<boolean>> {
    return this.guard(async () => {
      await this.host.ready();
      return this.useExternalStorage
        ? this.host.externalStore.exists(this.storeName)
        : this.host.internalStore.exists(this.storeName);
    });
  }

  public existsSync(): boolean {
    try {
      return this.useExternalStorage
        ? this.host.externalStore.existsSync(this.storeName)
        : this.host.internalStore.exists(this.storeName);
    } catch (error) {
      this.host.report(asKeyError(error, this.name));
      return false;
    }
  }

  /**
   * A key named `<this.name>.<suffix>` stored the same way as this one. Writing
   * it lists `suffix` in `this.subKeys`; removing it takes it off again.
   */
  public child(suffix: string): VaultKey<T>;
  public child<C>(suffix: string, codec: KeyCodec<C>): VaultKey<C>;
  public child<C>(suffix: string, codec?: KeyCodec<C>): VaultKey<T> | VaultKey<C> {
    const name = `${this.name}.${suffix}`;
    const parent = { name: this.name, suffix };
    return codec ? this.spawn(name, codec, parent) : this.spawn(name, this.codec, parent);
  }

  protected async loadEntry(): Promise<Entry | null> {
    if (this.useExternalStorage) {
      return this.host.externalStore.read(this.storeName);
    }
    return this.host.internalStore.read(this.storeName) ?? null;
  }

  protected loadEntrySync(): Entry | null {
    if (this.useExternalStorage) {
      return this.host.externalStore.readSync(this.storeName);
    }
    return this.host.internalStore.read(this.storeName) ?? null;
  }

  protected decodeWire(wire: WireValue): T {
    try {
      return this.codec.decode(wire);
    } catch (error) {
      if (error instanceof VaultError) throw error;
      throw new DecodeError("Stored value does not fit this key", { cause: error });
    }
  }

  private async persist(value: T | null): Promise<void> {
    await this.host.ready();
    if (value === null) {
      await this.erase();
      return;
    }

    const stored = await this.seal(this.codec.encode(value));
    const fields = { name: this.storeName, value: stored, flags: this.flags };
    if (this.useExternalStorage) {
      await this.host.externalStore.write(this.storeName, fields);
    } else {
      this.host.internalStore.write(this.storeName, fields);
    }

    if (this.parent) {
      await this.host.subKeyIndex(this.parent.name, this.secure).register(this.parent.suffix);
    }
    this.host.notify({ name: this.name, removed: false });
  }

  private async erase(): Promise<void> {
    if (this.useExternalStorage) {
      await this.host.externalStore.remove(this.storeName);
    } else {
      this.host.internalStore.remove(this.storeName);
    }

    if (this.parent) {
      await this.host.subKeyIndex(this.parent.name, this.secure).remove(this.parent.suffix);
    }
    this.host.notify({ name: this.name, removed: true });
  }

  private async discard(): Promise<void> {
    try {
      await this.erase();
    } catch (error) {
      this.host.report(asKeyError(error, this.name));
    }
  }

  private async guard<R>(fn: () => Promise<R>): Promise<Result<R>> {
    const result = await tryCatch(fn);
    if (result.success) return result;
    const error = asKeyError(result.error, this.name);
    this.host.report(error);
    return { success: false, data: null, error };
  }
}

/** A key stored as-is under its own name. */
export class PlainVaultKey<T> extends VaultKey<T> {
  public readonly secure = false;
  public readonly storeName: string = this.name;

  protected async seal(wire: WireValue): Promise<WireValue> {
    return wire;
  }

  protected async unseal(entry: Entry): Promise<WireValue> {
    return entry.value;
  }

  public readSync(): T | null {
    try {
      const entry = this.loadEntrySync();
      return entry ? this.decodeWire(entry.value) : null;
    } catch (error) {
      this.host.report(asKeyError(error, this.name));
      return null;
    }
  }

  protected spawn<C>(name: string, codec: KeyCodec<C>, parent: ParentLink): VaultKey<C> {
    const key = new PlainVaultKey(this.host, name, codec, this.options, parent);
    this.host.registerKey(key.descriptor);
    return key;
  }
}

/**
 * A key whose value and name are encrypted. The slot is named by the hash of
 * the key name; the real name is kept inside the ciphertext.
 */
export class SecureVaultKey<T> extends VaultKey<T> {
  public readonly secure = true;
  public readonly storeName: string = hashKeyName(this.name);

  protected async seal(wire: WireValue): Promise<WireValue> {
    return sealEnvelope(this.host.requireEncrypter(), this.name, wire);
  }

  protected async unseal(entry: Entry): Promise<WireValue> {
    if (entry.type !== ValueType.String) {
      throw new DecodeError(`Secure value is stored as ${ValueType[entry.type]}, not String`);
    }
    const envelope = await openEnvelope(this.host.requireEncrypter(), entry.value);
    if (envelope.k !== this.name) {
      // Another name hashes to this slot. Leave its value alone.
      throw new VaultError(`Slot ${this.storeName} belongs to "${envelope.k}"`);
    }
    return envelope.v;
  }

  /** Decryption is asynchronous, so this always reports and answers `null`. */
  public readSync(): T | null {
    this.host.report(
      new CryptoError("Secure keys cannot be read synchronously; use read()", { key: this.name }),
    );
    return null;
  }

  protected spawn<C>(name: string, codec: KeyCodec<C>, parent: ParentLink): VaultKey<C> {
    const key = new SecureVaultKey(this.host, name, codec, this.options, parent);
    this.host.registerKey(key.descriptor);
    return key;
  }
}
