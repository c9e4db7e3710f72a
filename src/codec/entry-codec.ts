import type { Entry, Header, TypedValue, WireValue } from "../models";
import { DecodeError, EncodeError } from "../utils/errors";
import {
  concatBytes,
  readUint32BE,
  shiftBytes,
  unShiftBytes,
  utf8Decode,
  utf8Encode,
} from "./bytes";
import { CODEC_VERSION, migrate } from "./migration";
import { checkTyped, serializeValue, tagValue, typeFromByte } from "./value-type";

/** Bit 0: dropped by `clearRemovable()`. */
export const FLAG_REMOVABLE = 1;
/** Bit 1: the value is an encrypted envelope. */
export const FLAG_SECURE = 2;

export const MAX_NAME_BYTES = 255;
/** StoreLen(1) + NameLen(1) + Flags(1) + Version(1) + Type(1). */
export const MIN_FRAME_BYTES = 5;
/** Longest possible frame prefix before the JSON payload starts. */
export const MAX_HEADER_BYTES = 1 + MAX_NAME_BYTES + 1 + MAX_NAME_BYTES + 3;

const RECORD_LENGTH_BYTES = 4;

export interface EncodeParams {
  storeName: string;
  keyName: string;
  value: WireValue;
  flags: number;
}

export interface BatchDecodeResult {
  entries: Map<string, Entry>;
  /** One error per corrupt region that was stepped over. */
  skipped: DecodeError[];
}

interface Frame extends Header {
  payloadOffset: number;
}

/**
 * Checks names and flags and tags the value, giving the in-memory form of an
 * entry at the current format version.
 *
 * @throws {EncodeError} when a name is over 255 UTF-8 bytes, the flags do not
 * fit one byte, or the value is outside the wire universe.
 */
export function createEntry({ storeName, keyName, value, flags }: EncodeParams): Entry {
  const storeNameBytes = utf8Encode(storeName).length;
  if (storeNameBytes > MAX_NAME_BYTES) {
    throw new EncodeError(`Store name too long: ${storeNameBytes} bytes`, { key: keyName });
  }

  const keyNameBytes = utf8Encode(keyName).length;
  if (keyNameBytes > MAX_NAME_BYTES) {
    throw new EncodeError(`Key name too long: ${keyNameBytes} bytes`, { key: keyName });
  }

  if (!Number.isInteger(flags) || flags < 0 || flags > 0xff) {
    throw new EncodeError(`Flags out of range: ${flags}`, { key: keyName });
  }

  let typed: TypedValue;
  try {
    typed = tagValue(value);
  } catch (error) {
    if (error instanceof EncodeError) {
      throw new EncodeError(error.message, { key: keyName, cause: error.cause });
    }
    throw error;
  }

  return { storeName, name: keyName, flags, version: CODEC_VERSION, ...typed };
}

/**
 * Encodes one entry as an obfuscated frame:
 *
 * `[storeNameLen:1][storeName][nameLen:1][name][flags:1][version:1][type:1][JSON]`
 *
 * @throws {EncodeError} as `createEntry` does.
 */
export function encodeEntry(params: EncodeParams): Uint8Array {
  const entry = createEntry(params);
  const storeNameBytes = utf8Encode(entry.storeName);
  const keyNameBytes = utf8Encode(entry.name);
  const json = utf8Encode(serializeValue(entry.value));

  const frame = new Uint8Array(
    1 + storeNameBytes.length + 1 + keyNameBytes.length + 3 + json.length,
  );
  let offset = 0;
  frame[offset++] = storeNameBytes.length;
  frame.set(storeNameBytes, offset);
  offset += storeNameBytes.length;
  frame[offset++] = keyNameBytes.length;
  frame.set(keyNameBytes, offset);
  offset += keyNameBytes.length;
  frame[offset++] = entry.flags;
  frame[offset++] = entry.version;
  frame[offset++] = entry.type;
  frame.set(json, offset);

  return shiftBytes(frame);
}

/** Reads the framing fields of an already un-rotated buffer. */
function readFrame(data: Uint8Array): Frame | null {
  if (data.length < MIN_FRAME_BYTES) return null;

  let offset = 0;
  const storeNameLen = data[offset++];
  if (offset + storeNameLen > data.length) return null;
  const storeName = utf8Decode(data.subarray(offset, offset + storeNameLen));
  offset += storeNameLen;

  if (offset + 1 > data.length) return null;
  const nameLen = data[offset++];
  if (offset + nameLen > data.length) return null;
  const name = utf8Decode(data.subarray(offset, offset + nameLen));
  offset += nameLen;

  if (offset + 3 > data.length) return null;
  const flags = data[offset++];
  const version = data[offset++];
  const type = typeFromByte(data[offset++]);

  return { storeName, name, flags, version, type, payloadOffset: offset };
}

/**
 * Decodes one obfuscated frame, payload included.
 *
 * @throws {DecodeError} on truncation, invalid UTF-8, invalid JSON, a payload
 * that does not match its type tag, or an unknown future version.
 */
export function parseEntry(bytes: Uint8Array): Entry {
  const data = unShiftBytes(bytes);

  let frame: Frame | null;
  try {
    frame = readFrame(data);
  } catch (error) {
    throw new DecodeError("Frame names are not valid UTF-8", { cause: error });
  }
  if (!frame) {
    throw new DecodeError(`Truncated frame (${data.length} bytes)`);
  }

  let json: unknown;
  try {
    json = JSON.parse(utf8Decode(data.subarray(frame.payloadOffset)));
  } catch (error) {
    throw new DecodeError("Payload is not valid UTF-8 JSON", { key: frame.name, cause: error });
  }

  let typed: TypedValue;
  try {
    typed = checkTyped(frame.type, json);
  } catch (error) {
    throw new DecodeError("Payload does not match its type tag", { key: frame.name, cause: error });
  }

  return migrate({
    storeName: frame.storeName,
    name: frame.name,
    flags: frame.flags,
    version: frame.version,
    ...typed,
  });
}

/** Like `parseEntry`, but answers `null` for empty or corrupt input. */
export function decodeEntry(bytes: Uint8Array): Entry | null {
  if (bytes.length === 0) return null;
  try {
    return parseEntry(bytes);
  } catch {
    return null;
  }
}

/**
 * Reads only the framing metadata of an obfuscated frame. The JSON payload is
 * neither un-rotated nor parsed, so `bytes` may be just the first
 * `MAX_HEADER_BYTES` of a file.
 */
export function readHeader(bytes: Uint8Array): Header | null {
  if (bytes.length < MIN_FRAME_BYTES) return null;

  const data = unShiftBytes(bytes.subarray(0, Math.min(bytes.length, MAX_HEADER_BYTES)));
  try {
    const frame = readFrame(data);
    if (!frame) return null;
    return {
      storeName: frame.storeName,
      name: frame.name,
      flags: frame.flags,
      version: frame.version,
      type: frame.type,
    };
  } catch {
    return null;
  }
}

/**
 * Encodes a whole store as `[payloadLen:4 BE][frame]` records and rotates the
 * result once more. Frames are keyed by the map key, not by `entry.storeName`.
 */
export function encodeAll(entries: ReadonlyMap<string, Entry>): Uint8Array {
  const chunks: Uint8Array[] = [];

  for (const [storeName, entry] of entries) {
    const payload = encodeEntry({
      storeName,
      keyName: entry.name,
      value: entry.value,
      flags: entry.flags,
    });
    const length = new Uint8Array(RECORD_LENGTH_BYTES);
    new DataView(length.buffer).setUint32(0, payload.length, false);
    chunks.push(length, payload);
  }

  return shiftBytes(concatBytes(chunks));
}

type RecordRead =
  | { ok: true; entry: Entry; next: number }
  | { ok: false; error: DecodeError };

function readRecord(data: Uint8Array, offset: number): RecordRead {
  if (offset + RECORD_LENGTH_BYTES > data.length) {
    return { ok: false, error: new DecodeError(`Truncated record length at offset ${offset}`) };
  }

  const length = readUint32BE(data, offset);
  const start = offset + RECORD_LENGTH_BYTES;
  if (start + length > data.length) {
    return {
      ok: false,
      error: new DecodeError(`Record length ${length} at offset ${offset} overruns the batch`),
    };
  }

  try {
    const entry = parseEntry(data.subarray(start, start + length));
    return { ok: true, entry, next: start + length };
  } catch (error) {
    const decodeError =
      error instanceof DecodeError
        ? error
        : new DecodeError(`Record at offset ${offset} is corrupt`, { cause: error });
    return { ok: false, error: decodeError };
  }
}

/** First offset at or after `from` where a whole record decodes, or -1. */
function resync(data: Uint8Array, from: number): number {
  for (let offset = from; offset + RECORD_LENGTH_BYTES <= data.length; offset++) {
    if (readRecord(data, offset).ok) return offset;
  }
  return -1;
}

/**
 * Decodes a batch produced by `encodeAll`. A corrupt record is collected in
 * `skipped` and stepped over; when its length prefix is what broke, the walk
 * scans forward for the next record that decodes. Later duplicates of a store
 * name win.
 */
export function decodeAll(bytes: Uint8Array): BatchDecodeResult {
  const entries = new Map<string, Entry>();
  const skipped: DecodeError[] = [];
  if (bytes.length === 0) return { entries, skipped };

  const data = unShiftBytes(bytes);
  let offset = 0;

  while (offset < data.length) {
    const record = readRecord(data, offset);
    if (record.ok) {
      entries.set(record.entry.storeName, record.entry);
      offset = record.next;
      continue;
    }

    skipped.push(record.error);
    const resumeAt = resync(data, offset + 1);
    if (resumeAt === -1) break;
    offset = resumeAt;
  }

  return { entries, skipped };
}
