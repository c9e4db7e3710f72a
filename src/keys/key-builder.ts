import type { WireValue } from "../models";
import type { KeyOptions } from "./interfaces";
import {
  booleanCodec,
  bytesCodec,
  decimalCodec,
  integerCodec,
  listCodec,
  mapCodec,
  stringCodec,
  wireCodec,
  type KeyCodec,
} from "./key-codecs";
import type { VaultKey } from "./vault-key";

export type KeyFactory = <T>(name: string, codec: KeyCodec<T>, options: KeyOptions) => VaultKey<T>;

/**
 * Hands out typed keys bound to one vault. `vault.key` builds plain keys and
 * `vault.secure` encrypted ones; both offer the same methods.
 *
 * @example
 * const theme = vault.key.string("theme", { removable: true });
 * const pin = vault.secure.integer("pin");
 */
export class KeyBuilder {
  constructor(private readonly create: KeyFactory) {}

  public string(name: string, options: KeyOptions = {}): VaultKey<string> {
    return this.create(name, stringCodec, options);
  }

  public integer(name: string, options: KeyOptions = {}): VaultKey<number> {
    return this.create(name, integerCodec, options);
  }

  public decimal(name: string, options: KeyOptions = {}): VaultKey<number> {
    return this.create(name, decimalCodec, options);
  }

  public boolean(name: string, options: KeyOptions = {}): VaultKey<boolean> {
    return this.create(name, booleanCodec, options);
  }

  public bytes(name: string, options: KeyOptions = {}): VaultKey<Uint8Array> {
    return this.create(name, bytesCodec, options);
  }

  /** Items are stored as given unless an item codec is supplied. */
  public list(name: string, options?: KeyOptions): VaultKey<WireValue[]>;
  public list<T>(name: string, item: KeyCodec<T>, options?: KeyOptions): VaultKey<T[]>;
  public list<T>(
    name: string,
    itemOrOptions?: KeyCodec<T> | KeyOptions,
    options: KeyOptions = {},
  ): VaultKey<WireValue[]> | VaultKey<T[]> {
    if (isCodec(itemOrOptions)) {
      return this.create(name, listCodec(itemOrOptions), options);
    }
    return this.create(name, listCodec(wireCodec), itemOrOptions ?? {});
  }

  public map(name: string, options?: KeyOptions): VaultKey<Record<string, WireValue>>;
  public map<T>(name: string, value: KeyCodec<T>, options?: KeyOptions): VaultKey<Record<string, T>>;
  public map<T>(
    name: string,
    valueOrOptions?: KeyCodec<T> | KeyOptions,
    options: KeyOptions = {},
  ): VaultKey<Record<string, WireValue>> | VaultKey<Record<string, T>> {
    if (isCodec(valueOrOptions)) {
      return this.create(name, mapCodec(valueOrOptions), options);
    }
    return this.create(name, mapCodec(wireCodec), valueOrOptions ?? {});
  }

  /** Any type, given a codec to and from storable values. */
  public custom<T>(name: string, codec: KeyCodec<T>, options: KeyOptions = {}): VaultKey<T> {
    return this.create(name, codec, options);
  }
}

function isCodec<T>(value: KeyCodec<T> | KeyOptions | undefined): value is KeyCodec<T> {
  return value !== undefined && "encode" in value && "decode" in value;
}
