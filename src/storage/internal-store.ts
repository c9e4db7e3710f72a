import * as path from "node:path";
import type { CodecRunner } from "../codec/codec-runner";
import { createEntry, FLAG_REMOVABLE, MIN_FRAME_BYTES } from "../codec/entry-codec";
import type { Clock, Entry, EntryFields, ErrorSink, Header } from "../models";
import { InitializationError, IOError, VaultError } from "../utils/errors";
import { getGroundedError } from "../utils/error-parser";
import { readFileIfPresent, writeFileAtomic } from "./atomic-file";
import { DebouncedTask } from "./debounced-task";

export const MAIN_FILE_NAME = "main.vault";

export interface InternalStoreOptions {
  codecRunner: CodecRunner;
  report: ErrorSink;
  debounceMs?: number;
  clock?: Clock;
}

/**
 * Small values, all held in memory and persisted together in `main.vault`.
 *
 * Reads never touch the disk. Every mutation restarts a short debounce; when
 * it fires the whole map is encoded on the codec runner and written with a
 * temp-file rename, so the file on disk is always a complete snapshot.
 */
export class InternalStore {
  private entries = new Map<string, Entry>();
  private filePath: string | null = null;
  private readonly flushTask: DebouncedTask;

  constructor(private readonly options: InternalStoreOptions) {
    this.flushTask = new DebouncedTask(() => this.writeSnapshot(), {
      delayMs: options.debounceMs,
      clock: options.clock,
      onError: (error) =>
        this.options.report(
          new IOError(`Failed to write ${MAIN_FILE_NAME}: ${getGroundedError(error)}`, {
            cause: error,
          }),
        ),
    });
  }

  /**
   * Loads `main.vault` from `root`, creating it empty when absent. Never
   * throws: an unreadable or corrupt file leaves the store empty and is
   * reported as an `InitializationError`; single bad records are reported as
   * `DecodeError`s and skipped.
   */
  public async init(root: string): Promise<void> {
    const filePath = path.join(root, MAIN_FILE_NAME);
    this.filePath = filePath;
    this.entries = new Map();

    let bytes: Uint8Array | null;
    try {
      bytes = await readFileIfPresent(filePath);
    } catch (error) {
      this.options.report(
        new InitializationError(`Cannot read ${MAIN_FILE_NAME}`, { cause: error }),
      );
      return;
    }

    if (bytes === null) {
      try {
        await writeFileAtomic(filePath, new Uint8Array(0));
      } catch (error) {
        this.options.report(
          new InitializationError(`Cannot create ${MAIN_FILE_NAME}`, { cause: error }),
        );
      }
      return;
    }

    if (bytes.length === 0) return;
    if (bytes.length < MIN_FRAME_BYTES) {
      this.options.report(
        new InitializationError(
          `${MAIN_FILE_NAME} is ${bytes.length} bytes, shorter than the smallest record`,
        ),
      );
      return;
    }

    try {
      const { entries, skipped } = await this.options.codecRunner.decodeAll(bytes);
      this.entries = entries;
      for (const error of skipped) this.options.report(error);
    } catch (error) {
      this.options.report(
        new InitializationError(`Cannot decode ${MAIN_FILE_NAME}`, { cause: error }),
      );
    }
  }

  public read(storeName: string): Entry | undefined {
    return this.entries.get(storeName);
  }

  public exists(storeName: string): boolean {
    return this.entries.has(storeName);
  }

  /** @throws {EncodeError} before anything changes when the value cannot be stored. */
  public write(storeName: string, fields: EntryFields): void {
    this.requireInit();
    const entry = createEntry({
      storeName,
      keyName: fields.name,
      value: fields.value,
      flags: fields.flags,
    });
    this.entries.set(storeName, entry);
    this.flushTask.schedule();
  }

  /** Returns whether there was anything to remove. */
  public remove(storeName: string): boolean {
    this.requireInit();
    const removed = this.entries.delete(storeName);
    if (removed) this.flushTask.schedule();
    return removed;
  }

  /** Drops every entry, removable or not. */
  public clear(): void {
    this.requireInit();
    this.entries.clear();
    this.flushTask.schedule();
  }

  /** Drops the entries flagged removable and returns their store names. */
  public clearRemovable(): string[] {
    this.requireInit();
    const removed: string[] = [];
    for (const [storeName, entry] of this.entries) {
      if (entry.flags & FLAG_REMOVABLE) removed.push(storeName);
    }
    for (const storeName of removed) this.entries.delete(storeName);
    if (removed.length > 0) this.flushTask.schedule();
    return removed;
  }

  public getEntries(): Map<string, Entry> {
    return new Map(this.entries);
  }

  public headers(): Header[] {
    return Array.from(this.entries.values(), ({ storeName, name, flags, version, type }) => ({
      storeName,
      name,
      flags,
      version,
      type,
    }));
  }

  /** Writes a pending change now instead of waiting out the debounce. */
  public flush(): Promise<void> {
    return this.flushTask.flush();
  }

  /** Resolves once no write is scheduled or running. */
  public idle(): Promise<void> {
    return this.flushTask.idle();
  }

  public async dispose(): Promise<void> {
    await this.flushTask.flush();
    this.flushTask.cancel();
  }

  private requireInit(): string {
    if (this.filePath === null) {
      throw new VaultError("InternalStore used before init()");
    }
    return this.filePath;
  }

  private async writeSnapshot(): Promise<void> {
    const filePath = this.requireInit();
    const bytes = await this.options.codecRunner.encodeAll(new Map(this.entries));
    await writeFileAtomic(filePath, bytes);
  }
}
