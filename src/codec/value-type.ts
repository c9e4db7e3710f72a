import { ValueType, type TypedValue, type WireMap, type WireValue } from "../models";
import { DecodeError, EncodeError } from "../utils/errors";

const TYPES_BY_BYTE: readonly ValueType[] = [
  ValueType.Null,
  ValueType.Int,
  ValueType.Double,
  ValueType.Bool,
  ValueType.String,
  ValueType.List,
  ValueType.Map,
  ValueType.Bytes,
];

/** Unknown bytes map to `Null`, which then only accepts a JSON `null` payload. */
export function typeFromByte(byte: number): ValueType {
  return TYPES_BY_BYTE[byte] ?? ValueType.Null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isWireValue(value: unknown): value is WireValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (value === null || value instanceof Uint8Array) return true;
      if (Array.isArray(value)) return value.every(isWireValue);
      return isWireMap(value);
    default:
      return false;
  }
}

export function isWireMap(value: unknown): value is WireMap {
  return isPlainObject(value) && Object.values(value).every(isWireValue);
}

function isByteList(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((b) => typeof b === "number" && Number.isInteger(b) && b >= 0 && b <= 255)
  );
}

function assertEncodable(value: unknown, path: string, seen: Set<object>): void {
  if (value === null) return;

  switch (typeof value) {
    case "string":
    case "boolean":
      return;
    case "number":
      if (!Number.isFinite(value)) {
        throw new EncodeError(`Cannot encode non-finite number at ${path}`);
      }
      return;
    case "object": {
      if (value instanceof Uint8Array) return;
      if (seen.has(value)) {
        throw new EncodeError(`Cannot encode circular reference at ${path}`);
      }
      seen.add(value);
      if (Array.isArray(value)) {
        value.forEach((item, index) => assertEncodable(item, `${path}[${index}]`, seen));
      } else if (isPlainObject(value)) {
        for (const [name, item] of Object.entries(value)) {
          assertEncodable(item, `${path}.${name}`, seen);
        }
      } else {
        throw new EncodeError(`Cannot encode ${value.constructor.name} instance at ${path}`);
      }
      seen.delete(value);
      return;
    }
    default:
      throw new EncodeError(`Cannot encode value of type ${typeof value} at ${path}`);
  }
}

/**
 * Derives the type tag from the runtime shape of `value`. Throws `EncodeError`
 * for anything outside the wire universe (NaN, bigint, class instances...).
 */
export function tagValue(value: WireValue): TypedValue {
  assertEncodable(value, "$", new Set());

  if (value === null) return { type: ValueType.Null, value: null };
  if (value instanceof Uint8Array) return { type: ValueType.Bytes, value };
  if (Array.isArray(value)) return { type: ValueType.List, value };

  switch (typeof value) {
    case "number":
      return Number.isInteger(value)
        ? { type: ValueType.Int, value }
        : { type: ValueType.Double, value };
    case "boolean":
      return { type: ValueType.Bool, value };
    case "string":
      return { type: ValueType.String, value };
    default:
      return { type: ValueType.Map, value };
  }
}

function bytesReplacer(_key: string, value: unknown): unknown {
  return value instanceof Uint8Array ? Array.from(value) : value;
}

/** JSON text for a value that already passed `tagValue`. Bytes become number lists. */
export function serializeValue(value: WireValue): string {
  return JSON.stringify(value, bytesReplacer);
}

/**
 * Checks a parsed JSON payload against its tag. A mismatch is a `DecodeError`;
 * nothing is coerced.
 */
export function checkTyped(type: ValueType, json: unknown): TypedValue {
  switch (type) {
    case ValueType.Int:
      if (typeof json === "number" && Number.isInteger(json)) {
        return { type: ValueType.Int, value: json };
      }
      break;
    case ValueType.Double:
      if (typeof json === "number" && Number.isFinite(json)) {
        return { type: ValueType.Double, value: json };
      }
      break;
    case ValueType.Bool:
      if (typeof json === "boolean") return { type: ValueType.Bool, value: json };
      break;
    case ValueType.String:
      if (typeof json === "string") return { type: ValueType.String, value: json };
      break;
    case ValueType.List:
      if (Array.isArray(json) && json.every(isWireValue)) {
        return { type: ValueType.List, value: json };
      }
      break;
    case ValueType.Map:
      if (isWireMap(json)) return { type: ValueType.Map, value: json };
      break;
    case ValueType.Bytes:
      if (isByteList(json)) return { type: ValueType.Bytes, value: Uint8Array.from(json) };
      break;
    case ValueType.Null:
      if (json === null) return { type: ValueType.Null, value: null };
      break;
  }

  throw new DecodeError(`Payload does not match type tag ${ValueType[type]}`);
}
