import { isWireMap, isWireValue } from "../codec/value-type";
import type { WireMap, WireValue } from "../models";
import { DecodeError } from "../utils/errors";

/**
 * Converts between a key's value type and what the codec can store. `decode`
 * throws when the stored shape is not what this key expects.
 */
export interface KeyCodec<T> {
  encode(value: T): WireValue;
  decode(wire: WireValue): T;
}

function shapeOf(wire: WireValue): string {
  if (wire === null) return "null";
  if (wire instanceof Uint8Array) return "bytes";
  if (Array.isArray(wire)) return "list";
  return typeof wire === "object" ? "map" : typeof wire;
}

function mismatch(expected: string, wire: WireValue): DecodeError {
  return new DecodeError(`Expected ${expected}, found ${shapeOf(wire)}`);
}

export const stringCodec: KeyCodec<string> = {
  encode: (value) => value,
  decode: (wire) => {
    if (typeof wire !== "string") throw mismatch("a string", wire);
    return wire;
  },
};

export const integerCodec: KeyCodec<number> = {
  encode: (value) => value,
  decode: (wire) => {
    if (typeof wire !== "number" || !Number.isInteger(wire)) throw mismatch("an integer", wire);
    return wire;
  },
};

export const decimalCodec: KeyCodec<number> = {
  encode: (value) => value,
  decode: (wire) => {
    if (typeof wire !== "number") throw mismatch("a number", wire);
    return wire;
  },
};

export const booleanCodec: KeyCodec<boolean> = {
  encode: (value) => value,
  decode: (wire) => {
    if (typeof wire !== "boolean") throw mismatch("a boolean", wire);
    return wire;
  },
};

export const bytesCodec: KeyCodec<Uint8Array> = {
  encode: (value) => value,
  decode: (wire) => {
    if (!(wire instanceof Uint8Array)) throw mismatch("bytes", wire);
    return wire;
  },
};

/** Passes any storable value through unchanged. */
export const wireCodec: KeyCodec<WireValue> = {
  encode: (value) => value,
  decode: (wire) => {
    if (!isWireValue(wire)) throw mismatch("a storable value", wire);
    return wire;
  },
};

export function listCodec<T>(item: KeyCodec<T>): KeyCodec<T[]> {
  return {
    encode: (values) => values.map((value) => item.encode(value)),
    decode: (wire) => {
      if (!Array.isArray(wire)) throw mismatch("a list", wire);
      return wire.map((element) => item.decode(element));
    },
  };
}

export function mapCodec<T>(value: KeyCodec<T>): KeyCodec<Record<string, T>> {
  return {
    encode: (record) => {
      const out: WireMap = {};
      for (const [name, item] of Object.entries(record)) out[name] = value.encode(item);
      return out;
    },
    decode: (wire) => {
      if (!isWireMap(wire)) throw mismatch("a map", wire);
      const out: Record<string, T> = {};
      for (const [name, item] of Object.entries(wire)) out[name] = value.decode(item);
      return out;
    },
  };
}
