import { KeyFactory, type KeyFactoryOptions } from "./api/KeyFactory";

export type { KeyFactoryOptions } from "./api/KeyFactory";
export { KeyFactory } from "./api/KeyFactory";
export { EncryptionKey, type KeyOptions } from "./key/EncryptionKey";
export { normalizePassword } from "./key/KeyDerivation";
export { Scheme, assertKnownScheme, assertSchemeConsistent, hmacOutputSize, type SchemeDefinition } from "./scheme/Scheme";
export { Format, encodeFormat, decodeFormat, isFormat } from "./scheme/Format";
export { NobleCryptoProvider, defaultCryptoProvider, type CryptoProvider } from "./crypto/CryptoProvider";
export { consoleLogger, silentLogger, type KeyLogger } from "./logging";
export { DK_CONSTANTS } from "./constants";
export type { HmacAlgorithm, KdfConfig, Pbkdf2Config, Argon2idConfig, SchemeSizes } from "./types";
export {
  KeyError,
  ImproperKeyError,
  ValidationError,
  SchemeError,
  WipedKeyError,
  type ImproperKeyDetail,
  type ImproperKeyKind
} from "./errors";

/**
 * Creates a `KeyFactory` bound to the given collaborators.
 *
 * @example
 * ```typescript
 * import derivedKey from 'derived-key';
 *
 * const keys = derivedKey();
 * const key = keys.random('correct horse battery staple', ['alice@example.com']);
 * const blob = key.rawData;          // version | key | iv | salt
 * keys.parse(blob).equals(key);      // true
 * key.wipe();
 * ```
 */
export default function derivedKey(opts?: KeyFactoryOptions): KeyFactory {
  return new KeyFactory(opts);
}
