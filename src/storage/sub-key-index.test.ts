import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import { shiftBytes, unShiftBytes } from "../codec/bytes";
import { FLAG_SECURE, parseEntry } from "../codec/entry-codec";
import { JoseEncrypter } from "../crypto/jose-encrypter";
import { ValueType, type ErrorSink } from "../models";
import { CryptoError, DecodeError } from "../utils/errors";
import { writeFileAtomic } from "./atomic-file";
import { SubKeyIndex, subKeyIndexFileName, type SubKeyChange } from "./sub-key-index";

vi.mock("./atomic-file", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./atomic-file")>();
  return { ...actual, writeFileAtomic: vi.fn(actual.writeFileAtomic) };
});

describe("SubKeyIndex", () => {
  let root: string;
  let report: Mock<ErrorSink>;

  const open = (parent = "profile") =>
    new SubKeyIndex(parent, { resolveDir: async () => root, report, debounceMs: 20 });

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "vault-subkeys-"));
    report = vi.fn<ErrorSink>();
    vi.mocked(writeFileAtomic).mockClear();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("persists registered names in a hashed file", async () => {
    const index = open();

    await index.register("b");
    await index.register("a");
    await index.flush();

    await fs.access(path.join(root, subKeyIndexFileName("profile")));
    expect(await open().list()).toEqual(["a", "b"]);
  });

  it("merges memory with what another writer put on disk", async () => {
    const first = open();
    const second = open();
    await second.exists();

    await first.register("a");
    await first.register("b");
    await first.flush();
    await second.register("b");
    await second.register("c");
    await second.flush();

    expect(await second.list()).toEqual(["a", "b", "c"]);
    expect(await open().list()).toEqual(["a", "b", "c"]);
  });

  it("does not rewrite the file when the merge adds nothing", async () => {
    const first = open();
    const second = open();
    await second.exists();
    await first.register("a");
    await first.register("b");
    await first.flush();
    expect(writeFileAtomic).toHaveBeenCalledTimes(1);

    await second.register("a");
    await second.flush();

    expect(writeFileAtomic).toHaveBeenCalledTimes(1);
    expect(await second.list()).toEqual(["a", "b"]);
  });

  it("does not bring back a removed name from disk", async () => {
    const index = open();
    await index.register("a");
    await index.register("b");
    await index.flush();

    await index.remove("a");
    await index.flush();

    expect(await index.list()).toEqual(["b"]);
    expect(await open().list()).toEqual(["b"]);
  });

  it("clears memory and deletes the file", async () => {
    const index = open();
    await index.register("a");
    await index.flush();

    await index.clear();

    expect(await index.exists()).toBe(false);
    await expect(fs.access(path.join(root, subKeyIndexFileName("profile")))).rejects.toThrow();
  });

  it("keeps parents apart", async () => {
    const profile = open("profile");
    const cart = open("cart");

    await profile.register("avatar");
    await cart.register("item1");
    await Promise.all([profile.flush(), cart.flush()]);

    expect(await open("profile").list()).toEqual(["avatar"]);
    expect(await open("cart").has("avatar")).toBe(false);
  });

  it("reads a corrupt file as empty and reports it", async () => {
    await fs.writeFile(path.join(root, subKeyIndexFileName("profile")), shiftBytes(Uint8Array.from([9, 9])));

    const index = open();

    expect(await index.list()).toEqual([]);
    expect(report).toHaveBeenCalledTimes(1);
    expect(report.mock.calls[0][0]).toBeInstanceOf(DecodeError);
  });

  it("names the frame by its file, not by the parent", async () => {
    const index = open("profile");
    await index.register("avatar");
    await index.flush();

    const entry = parseEntry(await fs.readFile(path.join(root, subKeyIndexFileName("profile"))));

    expect(entry.storeName).toBe(subKeyIndexFileName("profile"));
    expect(entry.name).toBe(subKeyIndexFileName("profile"));
    expect(entry.value).toEqual(["avatar"]);
  });

  describe("sealed with an encrypter", () => {
    const openSealed = (secret = "test-secret") => {
      const encrypter = new JoseEncrypter({ secret });
      return new SubKeyIndex("wallet", {
        resolveDir: async () => root,
        report,
        debounceMs: 20,
        encrypter: () => encrypter,
      });
    };
    const filePath = () => path.join(root, subKeyIndexFileName("wallet"));

    it("stores the child list as ciphertext", async () => {
      const index = openSealed();
      await index.register("seed");
      await index.flush();

      const bytes = await fs.readFile(filePath());
      const entry = parseEntry(bytes);
      const text = new TextDecoder().decode(unShiftBytes(bytes));

      expect(entry.flags).toBe(FLAG_SECURE);
      expect(entry.type).toBe(ValueType.String);
      expect(text.includes("wallet")).toBe(false);
      expect(text.includes("seed")).toBe(false);
      expect(await openSealed().list()).toEqual(["seed"]);
    });

    it("reports a wrong secret and leaves the file alone", async () => {
      const index = openSealed();
      await index.register("seed");
      await index.flush();
      const before = await fs.readFile(filePath());

      const other = openSealed("other-secret");
      expect(await other.list()).toEqual([]);
      await other.register("extra");
      await other.flush();

      expect(report.mock.calls[0][0]).toBeInstanceOf(CryptoError);
      expect(await fs.readFile(filePath())).toEqual(before);
    });
  });

  it("announces additions, removals and clears", async () => {
    const index = open();
    const changes: SubKeyChange[] = [];
    const unsubscribe = index.onChange((change) => changes.push(change));

    await index.register("x");
    await index.register("x");
    await index.remove("x");
    await index.clear();
    unsubscribe();
    await index.register("y");
    await index.dispose();

    expect(changes).toEqual([
      { type: "added", name: "x" },
      { type: "removed", name: "x" },
      { type: "cleared" },
    ]);
  });
});
