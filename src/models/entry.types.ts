/**
 * The type tag written next to every stored value. JSON alone cannot tell an
 * integer from a double, or a byte buffer from a list of numbers, so the tag
 * travels with the payload and decode checks the payload against it.
 */
export enum ValueType {
  Null = 0,
  Int = 1,
  Double = 2,
  Bool = 3,
  String = 4,
  List = 5,
  Map = 6,
  Bytes = 7,
}

export interface WireMap {
  [key: string]: WireValue;
}

/** Everything the codec can persist: the JSON universe plus raw bytes. */
export type WireValue =
  | null
  | number
  | boolean
  | string
  | Uint8Array
  | WireValue[]
  | WireMap;

export type TypedValue =
  | { type: ValueType.Null; value: null }
  | { type: ValueType.Int; value: number }
  | { type: ValueType.Double; value: number }
  | { type: ValueType.Bool; value: boolean }
  | { type: ValueType.String; value: string }
  | { type: ValueType.List; value: WireValue[] }
  | { type: ValueType.Map; value: WireMap }
  | { type: ValueType.Bytes; value: Uint8Array };

/** Framing metadata of a stored entry, readable without parsing the payload. */
export interface Header {
  /** The on-disk key. For secure keys this is the hash of the logical name. */
  readonly storeName: string;
  readonly name: string;
  readonly flags: number;
  readonly version: number;
  readonly type: ValueType;
}

export type Entry = Header & TypedValue;

/** What a store needs from a caller to persist one value. */
export interface EntryFields {
  name: string;
  value: WireValue;
  flags: number;
}
