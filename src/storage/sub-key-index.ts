import { EventEmitter } from "node:events";
import * as path from "node:path";
import { hashKeyName } from "../codec/bytes";
import { encodeEntry, FLAG_SECURE, parseEntry } from "../codec/entry-codec";
import type { VaultEncrypter } from "../crypto/encrypter";
import { ValueType, type Clock, type Entry, type ErrorSink, type WireValue } from "../models";
import { CryptoError, DecodeError, IOError, VaultError } from "../utils/errors";
import { readFileIfPresent, removeFile, writeFileAtomic } from "./atomic-file";
import { DebouncedTask } from "./debounced-task";

export type SubKeyChange =
  | { type: "added"; name: string }
  | { type: "removed"; name: string }
  | { type: "cleared" };

export interface SubKeyIndexOptions {
  /** Resolves the vault folder; awaited on first use. */
  resolveDir: () => Promise<string>;
  report: ErrorSink;
  debounceMs?: number;
  clock?: Clock;
  /**
   * Set for secure parents: the child list is then stored encrypted, as a
   * String frame flagged secure. Throws `CryptoError` when no encrypter is
   * configured.
   */
  encrypter?: () => VaultEncrypter;
}

/** File name of the index kept for `parentName`. */
export function subKeyIndexFileName(parentName: string): string {
  return hashKeyName(`${parentName}$sk`);
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const name of a) if (!b.has(name)) return false;
  return true;
}

/**
 * The child names registered under one parent key, persisted as a List frame
 * in its own file. The frame is named by the file's hash, never by the parent.
 *
 * Memory changes at once and a debounced flush merges it with whatever is on
 * disk: the union wins, except for names removed here since the last flush.
 * The file is rewritten only when the merge changed it.
 */
export class SubKeyIndex {
  private names = new Set<string>();
  private tombstones = new Set<string>();
  private loaded: Promise<void> | null = null;
  private filePath: string | null = null;
  private readonly flushTask: DebouncedTask;
  private readonly events = new EventEmitter();

  constructor(
    public readonly parentName: string,
    private readonly options: SubKeyIndexOptions,
  ) {
    this.flushTask = new DebouncedTask(() => this.mergeWithDisk(), {
      delayMs: options.debounceMs,
      clock: options.clock,
      onError: (error) =>
        this.options.report(
          new IOError("Failed to write the sub-key index", { key: parentName, cause: error }),
        ),
    });
  }

  public async register(childName: string): Promise<void> {
    await this.ensureLoaded();
    this.tombstones.delete(childName);
    if (this.names.has(childName)) return;
    this.names.add(childName);
    this.flushTask.schedule();
    this.emit({ type: "added", name: childName });
  }

  public async remove(childName: string): Promise<void> {
    await this.ensureLoaded();
    this.tombstones.add(childName);
    if (!this.names.delete(childName)) return;
    this.flushTask.schedule();
    this.emit({ type: "removed", name: childName });
  }

  /** Forgets every child and deletes the index file. */
  public async clear(): Promise<void> {
    const filePath = await this.ensureLoaded();
    this.flushTask.cancel();
    await this.flushTask.idle();
    this.names.clear();
    this.tombstones.clear();
    try {
      await removeFile(filePath);
    } catch (error) {
      throw new IOError("Cannot delete the sub-key index", { key: this.parentName, cause: error });
    }
    this.emit({ type: "cleared" });
  }

  public async exists(): Promise<boolean> {
    await this.ensureLoaded();
    return this.names.size > 0;
  }

  public async has(childName: string): Promise<boolean> {
    await this.ensureLoaded();
    return this.names.has(childName);
  }

  /** Child names in sorted order. */
  public async list(): Promise<string[]> {
    await this.ensureLoaded();
    return [...this.names].sort();
  }

  public onChange(listener: (change: SubKeyChange) => void): () => void {
    this.events.on("change", listener);
    return () => {
      this.events.off("change", listener);
    };
  }

  public flush(): Promise<void> {
    return this.flushTask.flush();
  }

  public idle(): Promise<void> {
    return this.flushTask.idle();
  }

  public async dispose(): Promise<void> {
    await this.flushTask.flush();
    this.flushTask.cancel();
    this.events.removeAllListeners();
  }

  private emit(change: SubKeyChange): void {
    this.events.emit("change", change);
  }

  private ensureLoaded(): Promise<string> {
    this.loaded ??= this.load().catch((error: unknown) => {
      this.loaded = null;
      throw error;
    });
    return this.loaded.then(() => this.requirePath());
  }

  private async load(): Promise<void> {
    const dir = await this.options.resolveDir();
    this.filePath = path.join(dir, subKeyIndexFileName(this.parentName));
    try {
      this.names = await this.readDiskSet();
    } catch (error) {
      const failure =
        error instanceof VaultError
          ? error
          : new IOError("Cannot read the sub-key index, starting empty", { cause: error });
      failure.key = this.parentName;
      this.options.report(failure);
    }
  }

  private requirePath(): string {
    if (this.filePath === null) {
      throw new IOError("Sub-key index has no location", { key: this.parentName });
    }
    return this.filePath;
  }

  /**
   * What the file holds now. A corrupt file is reported and read as empty; a
   * sealed file that cannot be decrypted throws, so nothing overwrites it.
   */
  private async readDiskSet(): Promise<Set<string>> {
    const bytes = await readFileIfPresent(this.requirePath());
    if (bytes === null || bytes.length === 0) return new Set();

    try {
      const names = new Set<string>();
      for (const item of await this.unpack(parseEntry(bytes))) {
        if (typeof item !== "string") throw new DecodeError("Sub-key names must be strings");
        names.add(item);
      }
      return names;
    } catch (error) {
      if (error instanceof CryptoError) throw error;
      this.options.report(
        new DecodeError("Corrupt sub-key index, starting empty", {
          key: this.parentName,
          cause: error,
        }),
      );
      return new Set();
    }
  }

  private async unpack(entry: Entry): Promise<WireValue[]> {
    if (!(entry.flags & FLAG_SECURE)) {
      if (entry.type !== ValueType.List) {
        throw new DecodeError(`Expected a List, found ${ValueType[entry.type]}`);
      }
      return entry.value;
    }

    if (entry.type !== ValueType.String) {
      throw new DecodeError(`Expected sealed String, found ${ValueType[entry.type]}`);
    }
    const json: unknown = JSON.parse(await this.requireEncrypter().decrypt(entry.value));
    if (!Array.isArray(json)) throw new DecodeError("Sealed sub-key index is not a list");
    return json;
  }

  private async pack(names: string[]): Promise<Uint8Array> {
    const fileName = subKeyIndexFileName(this.parentName);
    const sealed = this.options.encrypter !== undefined;
    return encodeEntry({
      storeName: fileName,
      keyName: fileName,
      value: sealed ? await this.requireEncrypter().encrypt(JSON.stringify(names)) : names,
      flags: sealed ? FLAG_SECURE : 0,
    });
  }

  private requireEncrypter(): VaultEncrypter {
    if (!this.options.encrypter) {
      throw new CryptoError("This sub-key index is sealed and needs an encrypter", {
        key: this.parentName,
      });
    }
    return this.options.encrypter();
  }

  private async mergeWithDisk(): Promise<void> {
    const filePath = this.requirePath();
    const disk = await this.readDiskSet();

    const applied = new Set(this.tombstones);
    const merged = new Set<string>();
    for (const name of disk) if (!applied.has(name)) merged.add(name);
    for (const name of this.names) merged.add(name);
    this.names = merged;
    this.tombstones.clear();

    if (sameSet(merged, disk)) return;

    try {
      await writeFileAtomic(filePath, await this.pack([...merged]));
    } catch (error) {
      for (const name of applied) {
        if (!this.names.has(name)) this.tombstones.add(name);
      }
      throw error;
    }
  }
}
