import { describe, it, expect } from "vitest";
import { DecodeError } from "./errors";
import { tryCatch } from "./try-catch";

describe("tryCatch", () => {
  it("wraps a resolved value", async () => {
    expect(await tryCatch(async () => 42)).toEqual({ success: true, data: 42, error: null });
  });

  it("keeps the class of a thrown vault error", async () => {
    const error = new DecodeError("bad record", { key: "k" });

    const result = await tryCatch(async () => {
      throw error;
    });

    expect(result).toEqual({ success: false, data: null, error });
    expect(result.error).toBe(error);
  });

  it("turns a thrown non-error into an Error", async () => {
    const result = await tryCatch(async () => {
      throw "plain text";
    });

    expect(result.error).toBeInstanceOf(Error);
    expect(result.error?.message).toBe("plain text");
  });
});
