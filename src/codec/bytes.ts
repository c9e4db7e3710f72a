const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

const MASK_64 = (1n << 64n) - 1n;

export function utf8Encode(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/** Throws a `TypeError` on malformed UTF-8 instead of inserting U+FFFD. */
export function utf8Decode(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/**
 * Rotates every byte one bit to the left. This only keeps files from being
 * readable at a glance; it is not encryption. Returns a new buffer.
 */
export function shiftBytes(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    out[i] = ((b << 1) | (b >> 7)) & 0xff;
  }
  return out;
}

/** Inverse of `shiftBytes`: one-bit right rotation. Returns a new buffer. */
export function unShiftBytes(bytes: Uint8Array): Uint8Array {
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    out[i] = ((b >> 1) | (b << 7)) & 0xff;
  }
  return out;
}

/**
 * DJB2 over the UTF-8 bytes of `name` (`hash * 33 + byte`, seed 5381),
 * wrapped to an unsigned 64-bit integer and rendered in base 36.
 *
 * Used to derive file names and secure store names. It is not collision
 * resistant and two names mapping to one hash will share a slot.
 */
export function hashKeyName(name: string): string {
  let hash = 5381n;
  for (const byte of utf8Encode(name)) {
    hash = (hash * 33n + BigInt(byte)) & MASK_64;
  }
  return hash.toString(36);
}

export function readUint32BE(bytes: Uint8Array, offset: number): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, false);
}

export function concatBytes(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const chunk of chunks) total += chunk.length;
  const out = new Uint8Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
