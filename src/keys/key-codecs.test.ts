import { describe, it, expect } from "vitest";
import { DecodeError } from "../utils/errors";
import {
  booleanCodec,
  bytesCodec,
  decimalCodec,
  integerCodec,
  listCodec,
  mapCodec,
  stringCodec,
} from "./key-codecs";

describe("key codecs", () => {
  it("accept their own shapes", () => {
    expect(stringCodec.decode("a")).toBe("a");
    expect(integerCodec.decode(3)).toBe(3);
    expect(decimalCodec.decode(3)).toBe(3);
    expect(booleanCodec.decode(false)).toBe(false);
    expect(bytesCodec.decode(Uint8Array.from([1]))).toEqual(Uint8Array.from([1]));
  });

  it("name what they found on a mismatch", () => {
    expect(() => stringCodec.decode(1)).toThrow("Expected a string, found number");
    expect(() => integerCodec.decode(1.5)).toThrow("Expected an integer, found number");
    expect(() => booleanCodec.decode(null)).toThrow("Expected a boolean, found null");
    expect(() => bytesCodec.decode([1])).toThrow("Expected bytes, found list");
    expect(() => decimalCodec.decode({})).toThrow(DecodeError);
  });

  it("map list items through the item codec", () => {
    const codec = listCodec(integerCodec);

    expect(codec.encode([1, 2])).toEqual([1, 2]);
    expect(codec.decode([1, 2])).toEqual([1, 2]);
    expect(() => codec.decode([1, "2"])).toThrow("Expected an integer, found string");
    expect(() => codec.decode("12")).toThrow("Expected a list, found string");
  });

  it("map record values through the value codec", () => {
    const codec = mapCodec(stringCodec);

    expect(codec.encode({ a: "x" })).toEqual({ a: "x" });
    expect(codec.decode({ a: "x" })).toEqual({ a: "x" });
    expect(() => codec.decode(["x"])).toThrow("Expected a map, found list");
  });
});
