import * as jose from "jose";
import { sha256 } from "@noble/hashes/sha2";
import { CryptoError } from "../utils/errors";
import type { VaultEncrypter } from "./encrypter";

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

export interface JoseEncrypterOptions {
  /** Any string. The AES key is its SHA-256 digest. */
  secret: string;
}

/**
 * Seals values as compact JWE (`dir` + `A256GCM`). Every call draws a fresh
 * IV, so encrypting the same text twice gives different tokens.
 */
export class JoseEncrypter implements VaultEncrypter {
  private readonly secret: string;
  private key: Uint8Array | null = null;

  constructor(options: JoseEncrypterOptions) {
    if (!options.secret) {
      throw new CryptoError("JoseEncrypter needs a non-empty secret");
    }
    this.secret = options.secret;
  }

  public async init(): Promise<void> {
    this.key ??= sha256(utf8Encoder.encode(this.secret));
  }

  private async getKey(): Promise<Uint8Array> {
    await this.init();
    if (!this.key) throw new CryptoError("Encryption key was not derived");
    return this.key;
  }

  public async encrypt(plaintext: string): Promise<string> {
    const key = await this.getKey();
    try {
      return await new jose.CompactEncrypt(utf8Encoder.encode(plaintext))
        .setProtectedHeader({ alg: "dir", enc: "A256GCM" })
        .encrypt(key);
    } catch (error) {
      throw new CryptoError("Encryption failed", { cause: error });
    }
  }

  public async decrypt(ciphertext: string): Promise<string> {
    const key = await this.getKey();
    try {
      const { plaintext } = await jose.compactDecrypt(ciphertext, key);
      return utf8Decoder.decode(plaintext);
    } catch (error) {
      throw new CryptoError("Decryption failed", { cause: error });
    }
  }
}
