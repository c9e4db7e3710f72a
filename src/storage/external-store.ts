import * as fs from "node:fs/promises";
import * as path from "node:path";
import { hashKeyName } from "../codec/bytes";
import {
  encodeEntry,
  FLAG_REMOVABLE,
  MAX_HEADER_BYTES,
  MAX_NAME_BYTES,
  parseEntry,
  readHeader,
} from "../codec/entry-codec";
import type { Entry, EntryFields, ErrorSink, Header } from "../models";
import { DecodeError, InitializationError, IOError, VaultError } from "../utils/errors";
import {
  fileSizeIfPresent,
  fileSizeIfPresentSync,
  listFiles,
  readFileIfPresent,
  readFileIfPresentSync,
  readFilePrefix,
  removeFile,
  TEMP_SUFFIX,
  writeFileAtomic,
} from "./atomic-file";
import { KeyedQueue } from "./keyed-queue";

export const EXTERNAL_DIR = "external";

const SAFE_FILE_NAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

/**
 * The file a store name lives in: the name itself when it is a plain,
 * portable file name, otherwise its hash.
 */
export function fileNameFor(storeName: string): string {
  const usable =
    SAFE_FILE_NAME.test(storeName) &&
    storeName.length <= MAX_NAME_BYTES &&
    !storeName.endsWith(TEMP_SUFFIX);
  return usable ? storeName : hashKeyName(storeName);
}

export interface ExternalStoreOptions {
  report: ErrorSink;
}

function decodeFile(bytes: Uint8Array | null, storeName: string): Entry | null {
  if (bytes === null || bytes.length === 0) return null;
  try {
    return parseEntry(bytes);
  } catch (error) {
    if (error instanceof DecodeError) {
      throw new DecodeError(error.message, { key: storeName, cause: error.cause });
    }
    throw error;
  }
}

/**
 * One file per key under `external/`, for values too large or too hot to
 * rewrite with the whole store.
 *
 * Operations on one file go through a per-file queue and run in the order
 * they were issued; different files proceed in parallel. Single-key failures
 * are thrown as `VaultError`s. Sweeps and listings report per-file failures
 * and carry on.
 */
export class ExternalStore {
  private dir: string | null = null;
  private readonly queue = new KeyedQueue();

  constructor(private readonly options: ExternalStoreOptions) {}

  public async init(root: string): Promise<void> {
    const dir = path.join(root, EXTERNAL_DIR);
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw new InitializationError(`Cannot create ${dir}`, { cause: error });
    }
    this.dir = dir;
  }

  private requireDir(): string {
    if (this.dir === null) {
      throw new VaultError("ExternalStore used before init()");
    }
    return this.dir;
  }

  private pathFor(storeName: string): { file: string; filePath: string } {
    const file = fileNameFor(storeName);
    return { file, filePath: path.join(this.requireDir(), file) };
  }

  public read(storeName: string): Promise<Entry | null> {
    const { file, filePath } = this.pathFor(storeName);
    return this.queue.run(file, async () => {
      let bytes: Uint8Array | null;
      try {
        bytes = await readFileIfPresent(filePath);
      } catch (error) {
        throw new IOError(`Cannot read ${file}`, { key: storeName, cause: error });
      }
      return decodeFile(bytes, storeName);
    });
  }

  /** @throws {EncodeError} without queueing anything when the value cannot be stored. */
  public write(storeName: string, fields: EntryFields): Promise<void> {
    const bytes = encodeEntry({
      storeName,
      keyName: fields.name,
      value: fields.value,
      flags: fields.flags,
    });
    const { file, filePath } = this.pathFor(storeName);
    return this.queue.run(file, async () => {
      try {
        await writeFileAtomic(filePath, bytes);
      } catch (error) {
        throw new IOError(`Cannot write ${file}`, { key: storeName, cause: error });
      }
    });
  }

  public remove(storeName: string): Promise<void> {
    const { file, filePath } = this.pathFor(storeName);
    return this.queue.run(file, async () => {
      try {
        await removeFile(filePath);
      } catch (error) {
        throw new IOError(`Cannot remove ${file}`, { key: storeName, cause: error });
      }
    });
  }

  /** An empty file counts as absent, matching `read`. */
  public exists(storeName: string): Promise<boolean> {
    const { file, filePath } = this.pathFor(storeName);
    return this.queue.run(file, async () => {
      try {
        return ((await fileSizeIfPresent(filePath)) ?? 0) > 0;
      } catch (error) {
        throw new IOError(`Cannot stat ${file}`, { key: storeName, cause: error });
      }
    });
  }

  /** Reads outside the queue. Safe because writes only ever rename whole files into place. */
  public readSync(storeName: string): Entry | null {
    const { file, filePath } = this.pathFor(storeName);
    let bytes: Uint8Array | null;
    try {
      bytes = readFileIfPresentSync(filePath);
    } catch (error) {
      throw new IOError(`Cannot read ${file}`, { key: storeName, cause: error });
    }
    return decodeFile(bytes, storeName);
  }

  public existsSync(storeName: string): boolean {
    const { file, filePath } = this.pathFor(storeName);
    try {
      return (fileSizeIfPresentSync(filePath) ?? 0) > 0;
    } catch (error) {
      throw new IOError(`Cannot stat ${file}`, { key: storeName, cause: error });
    }
  }

  /**
   * Deletes every file, one at a time in name order. The first failure is
   * reported and thrown, and the files after it are left in place.
   */
  public async clear(): Promise<void> {
    const dir = this.requireDir();
    const files = (await this.list(dir)).sort();
    for (const file of files) {
      try {
        await this.queue.run(file, () => removeFile(path.join(dir, file)));
      } catch (error) {
        const failure = new IOError(`Cannot remove ${file}`, { cause: error });
        this.options.report(failure);
        throw failure;
      }
    }
  }

  /**
   * Deletes the files whose header carries the removable flag. Only the
   * header prefix of each file is read, never the payload. Returns the store
   * names that were removed.
   */
  public async clearRemovable(): Promise<string[]> {
    const dir = this.requireDir();
    const files = await this.list(dir);
    const removed = await Promise.all(
      files.map((file) =>
        this.queue.run(file, async (): Promise<string | null> => {
          const filePath = path.join(dir, file);
          try {
            const header = readHeader(await readFilePrefix(filePath, MAX_HEADER_BYTES));
            if (!header) {
              this.options.report(new DecodeError(`Unreadable header in ${file}`));
              return null;
            }
            if (!(header.flags & FLAG_REMOVABLE)) return null;
            await removeFile(filePath);
            return header.storeName;
          } catch (error) {
            this.options.report(new IOError(`Cannot sweep ${file}`, { cause: error }));
            return null;
          }
        }),
      ),
    );
    return removed.filter((storeName): storeName is string => storeName !== null);
  }

  /** Framing metadata of every file, read from header prefixes only. */
  public async headers(): Promise<Header[]> {
    const dir = this.requireDir();
    const files = await this.list(dir);
    const headers = await Promise.all(
      files.map((file) =>
        this.queue.run(file, async (): Promise<Header | null> => {
          try {
            const bytes = await readFilePrefix(path.join(dir, file), MAX_HEADER_BYTES);
            if (bytes.length === 0) return null;
            const header = readHeader(bytes);
            if (!header) this.options.report(new DecodeError(`Unreadable header in ${file}`));
            return header;
          } catch (error) {
            this.options.report(new IOError(`Cannot read ${file}`, { cause: error }));
            return null;
          }
        }),
      ),
    );
    return headers.filter((header): header is Header => header !== null);
  }

  /** Fully decodes every file, keyed by store name. */
  public async getEntries(): Promise<Map<string, Entry>> {
    const dir = this.requireDir();
    const files = await this.list(dir);
    const entries = await Promise.all(
      files.map((file) =>
        this.queue.run(file, async (): Promise<Entry | null> => {
          try {
            return decodeFile(await readFileIfPresent(path.join(dir, file)), file);
          } catch (error) {
            this.options.report(
              error instanceof VaultError
                ? error
                : new IOError(`Cannot read ${file}`, { cause: error }),
            );
            return null;
          }
        }),
      ),
    );

    const result = new Map<string, Entry>();
    for (const entry of entries) {
      if (entry) result.set(entry.storeName, entry);
    }
    return result;
  }

  /** Resolves once every queued file operation has settled. */
  public idle(): Promise<void> {
    return this.queue.drain();
  }

  private async list(dir: string): Promise<string[]> {
    try {
      return await listFiles(dir);
    } catch (error) {
      throw new IOError(`Cannot list ${dir}`, { cause: error });
    }
  }
}
