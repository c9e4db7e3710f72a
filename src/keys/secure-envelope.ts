import { checkTyped, serializeValue, tagValue, typeFromByte } from "../codec/value-type";
import type { VaultEncrypter } from "../crypto/encrypter";
import type { WireValue } from "../models";
import { DecodeError } from "../utils/errors";

/**
 * Plaintext of a secure value. The logical name travels inside, because the
 * frame only carries its hash.
 */
export interface SecureEnvelope {
  k: string;
  v: WireValue;
}

/** Encrypts `{ k, v, t }` where `t` is the value's type tag. */
export async function sealEnvelope(
  encrypter: VaultEncrypter,
  name: string,
  value: WireValue,
): Promise<string> {
  const { type } = tagValue(value);
  const json: unknown = JSON.parse(serializeValue(value));
  return encrypter.encrypt(JSON.stringify({ k: name, v: json, t: type }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decrypts and checks an envelope. Decryption failures propagate as the
 * encrypter raised them; a malformed plaintext is a `DecodeError`.
 */
export async function openEnvelope(
  encrypter: VaultEncrypter,
  ciphertext: string,
): Promise<SecureEnvelope> {
  const plaintext = await encrypter.decrypt(ciphertext);

  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch (error) {
    throw new DecodeError("Secure envelope is not JSON", { cause: error });
  }
  if (!isRecord(parsed) || typeof parsed.k !== "string" || typeof parsed.t !== "number") {
    throw new DecodeError("Secure envelope is missing its name or type");
  }

  return { k: parsed.k, v: checkTyped(typeFromByte(parsed.t), parsed.v).value };
}
