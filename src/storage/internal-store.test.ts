import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from "vitest";
import { unShiftBytes, shiftBytes } from "../codec/bytes";
import { InlineCodecRunner } from "../codec/codec-runner";
import { encodeAll, FLAG_REMOVABLE } from "../codec/entry-codec";
import { ValueType, type Entry, type ErrorSink } from "../models";
import { DecodeError, EncodeError, InitializationError, IOError, VaultError } from "../utils/errors";
import { InternalStore, MAIN_FILE_NAME } from "./internal-store";

describe("InternalStore", () => {
  let root: string;
  let report: Mock<ErrorSink>;
  let runner: InlineCodecRunner;

  const makeStore = () => new InternalStore({ codecRunner: runner, report, debounceMs: 20 });

  const reopen = async () => {
    const store = makeStore();
    await store.init(root);
    return store;
  };

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "vault-internal-"));
    report = vi.fn<ErrorSink>();
    runner = new InlineCodecRunner();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("creates an empty file on first start", async () => {
    await reopen();

    const stat = await fs.stat(path.join(root, MAIN_FILE_NAME));
    expect(stat.size).toBe(0);
    expect(report).not.toHaveBeenCalled();
  });

  it("reads back the last map after a flush", async () => {
    const store = await reopen();

    store.write("theme", { name: "theme", value: "dark", flags: 0 });
    store.write("volume", { name: "volume", value: 0.5, flags: FLAG_REMOVABLE });
    await store.flush();

    const reopened = await reopen();
    expect(reopened.read("theme")).toMatchObject({ value: "dark", type: ValueType.String });
    expect(reopened.read("volume")).toMatchObject({
      value: 0.5,
      type: ValueType.Double,
      flags: FLAG_REMOVABLE,
    });
  });

  it("coalesces a burst of writes into one flush of the final state", async () => {
    const encodeSpy = vi.spyOn(runner, "encodeAll");
    const store = await reopen();

    for (let i = 1; i <= 10; i++) {
      store.write("counter", { name: "counter", value: i, flags: 0 });
    }
    await store.idle();

    expect(encodeSpy).toHaveBeenCalledTimes(1);
    expect((await reopen()).read("counter")?.value).toBe(10);
  });

  it("serves reads from memory before anything is written", async () => {
    const store = await reopen();

    store.write("k", { name: "k", value: [1, 2], flags: 0 });

    expect(store.exists("k")).toBe(true);
    expect(store.read("k")?.value).toEqual([1, 2]);
    expect(await fs.readFile(path.join(root, MAIN_FILE_NAME))).toHaveLength(0);
    await store.dispose();
  });

  it("removes single entries and clears everything", async () => {
    const store = await reopen();
    store.write("a", { name: "a", value: 1, flags: 0 });
    store.write("b", { name: "b", value: 2, flags: FLAG_REMOVABLE });

    expect(store.remove("a")).toBe(true);
    expect(store.remove("a")).toBe(false);
    expect([...store.getEntries().keys()]).toEqual(["b"]);

    store.clear();
    await store.flush();
    expect((await reopen()).getEntries().size).toBe(0);
  });

  it("sweeps only removable entries", async () => {
    const store = await reopen();
    store.write("keep", { name: "keep", value: true, flags: 0 });
    store.write("drop1", { name: "drop1", value: "x", flags: FLAG_REMOVABLE });
    store.write("drop2", { name: "drop2", value: null, flags: FLAG_REMOVABLE });

    expect(store.clearRemovable()).toEqual(["drop1", "drop2"]);
    await store.flush();

    const reopened = await reopen();
    expect([...reopened.getEntries().keys()]).toEqual(["keep"]);
    expect(reopened.clearRemovable()).toEqual([]);
  });

  it("lists headers without values", async () => {
    const store = await reopen();
    store.write("a", { name: "a", value: "x", flags: FLAG_REMOVABLE });

    expect(store.headers()).toEqual([
      { storeName: "a", name: "a", flags: FLAG_REMOVABLE, version: 1, type: ValueType.String },
    ]);
    await store.dispose();
  });

  it("refuses values it cannot encode and changes nothing", async () => {
    const store = await reopen();

    expect(() => store.write("bad", { name: "bad", value: Number.NaN, flags: 0 })).toThrow(EncodeError);
    expect(store.exists("bad")).toBe(false);
  });

  it("refuses mutations before init", () => {
    const store = makeStore();

    expect(() => store.write("k", { name: "k", value: 1, flags: 0 })).toThrow(VaultError);
  });

  it("skips a corrupt record at load and reports it", async () => {
    const entries = new Map<string, Entry>([
      ["a", { storeName: "a", name: "a", flags: 0, version: 1, type: ValueType.Int, value: 1 }],
      ["b", { storeName: "b", name: "b", flags: 0, version: 1, type: ValueType.Int, value: 42 }],
    ]);
    const data = unShiftBytes(encodeAll(entries));
    data.set([0xff, 0xff, 0xff, 0xff], 0);
    await fs.writeFile(path.join(root, MAIN_FILE_NAME), shiftBytes(data));

    const store = await reopen();

    expect([...store.getEntries().keys()]).toEqual(["b"]);
    expect(report).toHaveBeenCalledTimes(1);
    expect(report.mock.calls[0][0]).toBeInstanceOf(DecodeError);
  });

  it("starts empty when the file is shorter than one record", async () => {
    await fs.writeFile(path.join(root, MAIN_FILE_NAME), Uint8Array.from([1, 2, 3]));

    const store = await reopen();

    expect(store.getEntries().size).toBe(0);
    expect(report.mock.calls[0][0]).toBeInstanceOf(InitializationError);
  });

  it("reports a failed flush and keeps the previous file", async () => {
    const store = await reopen();
    store.write("a", { name: "a", value: 1, flags: 0 });
    await store.flush();
    const before = await fs.readFile(path.join(root, MAIN_FILE_NAME));

    vi.spyOn(runner, "encodeAll").mockRejectedValueOnce(new Error("encoder exploded"));
    store.write("a", { name: "a", value: 2, flags: 0 });
    await store.flush();

    expect(report).toHaveBeenCalledTimes(1);
    expect(report.mock.calls[0][0]).toBeInstanceOf(IOError);
    expect(await fs.readFile(path.join(root, MAIN_FILE_NAME))).toEqual(before);
  });
});
