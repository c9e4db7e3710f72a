import { describe, it, expect } from "vitest";
import { ValueType, type WireValue } from "../models";
import { DecodeError, EncodeError } from "../utils/errors";
import { checkTyped, serializeValue, tagValue, typeFromByte } from "./value-type";

describe("tagValue", () => {
  it.each<[WireValue, ValueType]>([
    [null, ValueType.Null],
    [42, ValueType.Int],
    [1.5, ValueType.Double],
    [true, ValueType.Bool],
    ["hi", ValueType.String],
    [[1, "two"], ValueType.List],
    [{ a: 1 }, ValueType.Map],
    [Uint8Array.from([1, 2]), ValueType.Bytes],
  ])("tags %o as %s", (value, type) => {
    expect(tagValue(value).type).toBe(type);
  });

  it("refuses non-finite numbers, even nested", () => {
    expect(() => tagValue(Number.NaN)).toThrow(EncodeError);
    expect(() => tagValue({ ratio: Number.POSITIVE_INFINITY })).toThrow(
      "Cannot encode non-finite number at $.ratio",
    );
  });

  it("refuses circular structures", () => {
    const list: WireValue[] = [];
    list.push(list);

    expect(() => tagValue(list)).toThrow("Cannot encode circular reference at $[0]");
  });

  it("accepts the same object twice when it is not a cycle", () => {
    const shared = { x: 1 };

    expect(tagValue([shared, shared]).type).toBe(ValueType.List);
  });
});

describe("serializeValue", () => {
  it("writes bytes as number lists at any depth", () => {
    expect(serializeValue(Uint8Array.from([1, 2]))).toBe("[1,2]");
    expect(serializeValue({ b: Uint8Array.from([3]) })).toBe('{"b":[3]}');
  });
});

describe("checkTyped", () => {
  it("never coerces a payload into another type", () => {
    expect(() => checkTyped(ValueType.Int, 1.5)).toThrow(DecodeError);
    expect(() => checkTyped(ValueType.String, 5)).toThrow(DecodeError);
    expect(() => checkTyped(ValueType.Map, [1])).toThrow(DecodeError);
    expect(() => checkTyped(ValueType.Bool, "true")).toThrow(DecodeError);
  });

  it("lets a Double hold an integral number", () => {
    expect(checkTyped(ValueType.Double, 2)).toEqual({ type: ValueType.Double, value: 2 });
  });

  it("restores bytes only from integers in range", () => {
    expect(checkTyped(ValueType.Bytes, [1, 2])).toEqual({
      type: ValueType.Bytes,
      value: Uint8Array.from([1, 2]),
    });
    expect(() => checkTyped(ValueType.Bytes, [1, 256])).toThrow(DecodeError);
  });

  it("reads unknown tag bytes as Null", () => {
    const type = typeFromByte(42);

    expect(type).toBe(ValueType.Null);
    expect(checkTyped(type, null)).toEqual({ type: ValueType.Null, value: null });
    expect(() => checkTyped(type, 0)).toThrow(DecodeError);
  });
});
