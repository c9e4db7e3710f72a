/** @vitest-environment node */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import { IOError, Vault, type ErrorSink } from "../../src";
import { makeTempRoot } from "./temp-root";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, rename: vi.fn(actual.rename) };
});

const diskFull = () => Object.assign(new Error("no space left"), { code: "ENOSPC" });

describe("Atomic writes when the rename fails", () => {
  let root: string;
  let cleanup: () => Promise<void>;
  let onError: Mock<ErrorSink>;
  let vault: Vault;

  beforeEach(async () => {
    ({ root, cleanup } = await makeTempRoot("atomic"));
    onError = vi.fn<ErrorSink>();
    vault = new Vault({ root, onError, debounceMs: 10 });
    await vault.init();
  });

  afterEach(async () => {
    await vault.dispose();
    vi.mocked(fs.rename).mockClear();
    await cleanup();
  });

  it("should keep the previous main.vault and retry on the next flush", async () => {
    const mainPath = path.join(root, "vault", "main.vault");
    const counter = vault.key.integer("counter");

    // 1. Persist a first snapshot
    await counter.write(1);
    await vault.flush();
    const before = await fs.readFile(mainPath);

    // 2. Fail the rename of the next snapshot
    vi.mocked(fs.rename).mockRejectedValueOnce(diskFull());
    await counter.write(2);
    await vault.flush();

    expect(await fs.readFile(mainPath)).toEqual(before);
    expect(await fs.readdir(path.join(root, "vault"))).not.toContain("main.vault.tmp");
    expect(onError).toHaveBeenCalledTimes(1);
    const [error] = onError.mock.calls[0];
    expect(error).toBeInstanceOf(IOError);
    expect(error.message).toBe("Failed to write main.vault: no space left");

    // 3. The next change writes the whole map again
    await counter.write(3);
    await vault.dispose();

    const reopened = new Vault({ root, onError, debounceMs: 10 });
    expect(await reopened.key.integer("counter").read()).toBe(3);
    await reopened.dispose();
  });

  it("should hand back an IOError when an external file cannot be replaced", async () => {
    const notes = vault.key.string("notes", { useExternalStorage: true });
    await notes.write("first");

    vi.mocked(fs.rename).mockRejectedValueOnce(diskFull());
    const result = await notes.write("second");

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(IOError);
    expect(result.error?.message).toBe("Cannot write notes");
    expect(onError).toHaveBeenCalledTimes(1);
    expect(await fs.readdir(path.join(root, "vault", "external"))).toEqual(["notes"]);
    expect(await notes.read()).toBe("first");
  });
});
