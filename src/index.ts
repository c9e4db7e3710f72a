// --- Facade ---
export { Vault, DEFAULT_FOLDER_NAME } from "./vault/vault";

// --- Keys ---
export { KeyBuilder } from "./keys/key-builder";
export { VaultKey, PlainVaultKey, SecureVaultKey } from "./keys/vault-key";
export type { KeyOptions, KeyDescriptor } from "./keys/interfaces";
export {
  booleanCodec,
  bytesCodec,
  decimalCodec,
  integerCodec,
  listCodec,
  mapCodec,
  stringCodec,
  wireCodec,
} from "./keys/key-codecs";
export type { KeyCodec } from "./keys/key-codecs";

// --- Storage ---
export { SubKeyIndex } from "./storage/sub-key-index";
export type { SubKeyChange } from "./storage/sub-key-index";
export { DEBOUNCE_MS } from "./storage/debounced-task";

// --- Codec ---
export { CODEC_VERSION } from "./codec/migration";
export {
  createEntry,
  decodeAll,
  decodeEntry,
  encodeAll,
  encodeEntry,
  FLAG_REMOVABLE,
  FLAG_SECURE,
  MAX_HEADER_BYTES,
  parseEntry,
  readHeader,
} from "./codec/entry-codec";
export type { BatchDecodeResult, EncodeParams } from "./codec/entry-codec";
export { hashKeyName, shiftBytes, unShiftBytes } from "./codec/bytes";
export { InlineCodecRunner, WorkerCodecRunner } from "./codec/codec-runner";
export type { CodecRunner, CodecWorkerPort, WorkerCodecRunnerOptions } from "./codec/codec-runner";

// --- Crypto ---
export { JoseEncrypter } from "./crypto/jose-encrypter";
export type { JoseEncrypterOptions } from "./crypto/jose-encrypter";
export type { VaultEncrypter } from "./crypto/encrypter";

// --- Errors & models ---
export {
  CryptoError,
  DecodeError,
  EncodeError,
  InitializationError,
  IOError,
  VaultError,
} from "./utils/errors";
export { getGroundedError } from "./utils/error-parser";
export { ValueType, systemClock } from "./models";
export type {
  Clock,
  Entry,
  ErrorSink,
  Header,
  Logger,
  Result,
  TypedValue,
  VaultChange,
  VaultOptions,
  WireMap,
  WireValue,
} from "./models";
