import * as fs from "node:fs/promises";
import * as fsSync from "node:fs";
import * as path from "node:path";
import { errorCode } from "../utils/errors";

export const TEMP_SUFFIX = ".tmp";

/**
 * Writes `data` next to `filePath` first and renames it into place, so a
 * reader sees either the old file or the new one, never half of either.
 * If the rename fails the temp file is removed and the error rethrown.
 */
export async function writeFileAtomic(filePath: string, data: Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = filePath + TEMP_SUFFIX;
  await fs.writeFile(tempPath, data, { mode: 0o600 });
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/** File contents, or `null` when the file does not exist. */
export async function readFileIfPresent(filePath: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    if (errorCode(error) === "ENOENT") return null;
    throw error;
  }
}

export function readFileIfPresentSync(filePath: string): Uint8Array | null {
  try {
    return new Uint8Array(fsSync.readFileSync(filePath));
  } catch (error) {
    if (errorCode(error) === "ENOENT") return null;
    throw error;
  }
}

/** At most the first `length` bytes of a file, read through a handle. */
export async function readFilePrefix(filePath: string, length: number): Promise<Uint8Array> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = new Uint8Array(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/** Deletes a file; a missing file is not an error. */
export async function removeFile(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

/** Size in bytes, or `null` when the file does not exist. */
export async function fileSizeIfPresent(filePath: string): Promise<number | null> {
  try {
    return (await fs.stat(filePath)).size;
  } catch (error) {
    if (errorCode(error) === "ENOENT") return null;
    throw error;
  }
}

export function fileSizeIfPresentSync(filePath: string): number | null {
  try {
    return fsSync.statSync(filePath).size;
  } catch (error) {
    if (errorCode(error) === "ENOENT") return null;
    throw error;
  }
}

/** Names in a directory, leaving out temp files of interrupted writes. */
export async function listFiles(dirPath: string): Promise<string[]> {
  const names = await fs.readdir(dirPath);
  return names.filter((name) => !name.endsWith(TEMP_SUFFIX));
}
