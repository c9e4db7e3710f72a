/**
 * What the vault needs to protect secure keys. Implementations receive and
 * return text; the vault stores the ciphertext as a String value.
 */
export interface VaultEncrypter {
  /** Called once from `Vault.init()` before any secure key is touched. */
  init(): Promise<void>;
  encrypt(plaintext: string): Promise<string>;
  /** Must reject when the ciphertext was not produced with the same secret. */
  decrypt(ciphertext: string): Promise<string>;
}
