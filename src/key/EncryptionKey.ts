import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { defaultCryptoProvider, type CryptoProvider } from "../crypto/CryptoProvider";
import { ImproperKeyError, SchemeError, ValidationError, WipedKeyError } from "../errors";
import { silentLogger, type KeyLogger } from "../logging";
import { encodeFormat } from "../scheme/Format";
import { assertKnownScheme, assertSchemeConsistent, Scheme } from "../scheme/Scheme";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { bytesEqual, concatBytes, copyBytes, lengthPrefixed } from "../utils/bytes";
import { normalizePassword, requireMaterialSizes, treatSeed } from "./KeyDerivation";
import { decodeKeyParts, encodeKeyParts, type KeyParts } from "./KeySerialization";

/**
 * Collaborators and labelling for a single key construction.
 */
export interface KeyOptions {
  crypto?: CryptoProvider;
  logger?: KeyLogger;
  /** Label for the resulting key, e.g. an account id. */
  context?: string;
}

function assertContext(context: unknown): asserts context is string | undefined {
  if (context !== undefined && typeof context !== "string") {
    throw new ValidationError("context must be a string when provided");
  }
}

/**
 * A semantic representation of a symmetric key derived from a password.
 *
 * Instances are immutable: byte fields are copied in and out, and relabelling
 * goes through {@link EncryptionKey.withContext}. The only state change is
 * {@link EncryptionKey.wipe}, which zero-fills the key material once the
 * holder is done with it.
 *
 * @example
 * ```typescript
 * const key = EncryptionKey.random("correct horse", ["alice@example.com"]);
 * const stored = key.toBase64();
 * const again = EncryptionKey.fromBase64(stored);
 * again.equals(key); // true
 * key.wipe();
 * ```
 */
export class EncryptionKey {
  readonly scheme: Scheme;
  /** Label such as an account id. Not part of derivation or of `rawData`. */
  readonly context: string | undefined;

  private readonly keyBytes: Uint8Array;
  private readonly ivBytes: Uint8Array;
  private readonly saltBytes: Uint8Array;
  private wiped = false;

  private constructor(parts: KeyParts, context: string | undefined) {
    this.scheme = parts.scheme;
    this.keyBytes = copyBytes(parts.keyData);
    this.ivBytes = copyBytes(parts.initializationVector);
    this.saltBytes = copyBytes(parts.salt);
    this.context = context;
  }

  // --------------------------- construction ---------------------------

  /**
   * Derives a new key from a password using a fresh random seed and IV.
   * Calling this twice with the same input yields different keys.
   *
   * @param password - Raw password; trimmed and NFKD-normalized before use.
   * @param additionalKeywords - Context (account id, email, ...) bound into the salt.
   * @throws {SchemeError} If `scheme` declares sizes that cannot agree, or the
   *   random source returns material that does not fit them.
   */
  static random(
    password: string,
    additionalKeywords: readonly string[] = [],
    scheme: Scheme = Scheme.primary,
    options: KeyOptions = {}
  ): EncryptionKey {
    assertSchemeConsistent(scheme);
    assertKnownScheme(scheme);
    const crypto = options.crypto ?? defaultCryptoProvider;
    const seed = crypto.randomBytes(scheme.seedSize);
    const iv = crypto.randomBytes(scheme.initializationVectorSize);

    try {
      return EncryptionKey.fromSeed(password, additionalKeywords, seed, iv, scheme, options);
    } catch (e) {
      if (e instanceof ImproperKeyError) {
        throw new SchemeError(
          `Random material did not fit scheme v${scheme.format}: ${e.message}`,
          { cause: e }
        );
      }
      throw e;
    } finally {
      seed.fill(0);
    }
  }

  /**
   * Derives a key from a caller-supplied seed. The seed is HMAC-ed with each
   * keyword in order to produce the treated salt, then handed to
   * {@link EncryptionKey.fromSalt}.
   *
   * @throws {ImproperKeyError} `seedSize`, `saltSize` or `initializationVectorSize`.
   * @throws {SchemeError} If `scheme` is not a built-in scheme.
   */
  static fromSeed(
    untreatedPassword: string,
    additionalKeywords: readonly string[],
    seed: Uint8Array,
    iv: Uint8Array,
    scheme: Scheme,
    options: KeyOptions = {}
  ): EncryptionKey {
    assertKnownScheme(scheme);
    const crypto = options.crypto ?? defaultCryptoProvider;
    const logger = options.logger ?? silentLogger;
    const treatedSalt = treatSeed(seed, additionalKeywords, scheme, crypto, logger);
    return EncryptionKey.fromSalt(untreatedPassword, treatedSalt, iv, scheme, options);
  }

  /**
   * Derives a key from an already treated salt. Same inputs, same key.
   *
   * @throws {ImproperKeyError} `saltSize` or `initializationVectorSize`.
   * @throws {SchemeError} If `scheme` is not a built-in scheme.
   */
  static fromSalt(
    untreatedPassword: string,
    treatedSalt: Uint8Array,
    iv: Uint8Array,
    scheme: Scheme,
    options: KeyOptions = {}
  ): EncryptionKey {
    assertKnownScheme(scheme);
    const crypto = options.crypto ?? defaultCryptoProvider;
    const logger = options.logger ?? silentLogger;
    assertContext(options.context);

    const password = normalizePassword(untreatedPassword);
    requireMaterialSizes(treatedSalt, iv, scheme, logger);

    const keyData = scheme.deriveKey(password, treatedSalt, crypto);
    logger.debug("Derived key", { version: scheme.format, keyLength: keyData.byteLength });

    return new EncryptionKey(
      { scheme, keyData, initializationVector: iv, salt: treatedSalt },
      options.context
    );
  }

  /**
   * Rebuilds a key from {@link EncryptionKey.rawData}. The payload is taken
   * verbatim; nothing is re-derived.
   *
   * @throws {ImproperKeyError} `badFormatData` for an unknown or truncated
   *   version tag; `saltSize` / `initializationVectorSize` for a truncated body.
   */
  static fromRawData(data: Uint8Array, options: Omit<KeyOptions, "crypto"> = {}): EncryptionKey {
    assertContext(options.context);
    const parts = decodeKeyParts(data, options.logger ?? silentLogger);
    return new EncryptionKey(parts, options.context);
  }

  static fromBase64(text: string, options: Omit<KeyOptions, "crypto"> = {}): EncryptionKey {
    return EncryptionKey.fromRawData(base64ToBytes(text), options);
  }

  // --------------------------- accessors ---------------------------

  get keyData(): Uint8Array {
    this.requireLive();
    return copyBytes(this.keyBytes);
  }

  get initializationVector(): Uint8Array {
    this.requireLive();
    return copyBytes(this.ivBytes);
  }

  get salt(): Uint8Array {
    this.requireLive();
    return copyBytes(this.saltBytes);
  }

  get isWiped(): boolean {
    return this.wiped;
  }

  /**
   * `version | keyData | iv | salt`. Keep it somewhere safe: it is the key.
   */
  get rawData(): Uint8Array {
    this.requireLive();
    return encodeKeyParts(this.parts());
  }

  toBase64(): string {
    return bytesToBase64(this.rawData);
  }

  /** Same key material under a different label (or none). */
  withContext(context: string | undefined): EncryptionKey {
    this.requireLive();
    assertContext(context);
    return new EncryptionKey(this.parts(), context);
  }

  // --------------------------- equality ---------------------------

  equals(other: EncryptionKey): boolean {
    this.requireLive();
    other.requireLive();
    return (
      this.scheme.equals(other.scheme) &&
      bytesEqual(this.ivBytes, other.ivBytes) &&
      bytesEqual(this.saltBytes, other.saltBytes) &&
      bytesEqual(this.keyBytes, other.keyBytes) &&
      this.context === other.context
    );
  }

  /**
   * Hex digest over scheme, IV, salt, key and context. Keys that differ only
   * in context hash differently.
   */
  hashCode(): string {
    this.requireLive();
    const context =
      this.context === undefined
        ? new Uint8Array([0])
        : concatBytes(new Uint8Array([1]), lengthPrefixed(utf8ToBytes(this.context)));
    return bytesToHex(
      sha256(
        concatBytes(
          encodeFormat(this.scheme.format),
          lengthPrefixed(this.ivBytes),
          lengthPrefixed(this.saltBytes),
          lengthPrefixed(this.keyBytes),
          context
        )
      )
    );
  }

  // --------------------------- lifecycle ---------------------------

  /** Zero-fills the key material. Every later read throws {@link WipedKeyError}. */
  wipe(): void {
    this.keyBytes.fill(0);
    this.ivBytes.fill(0);
    this.saltBytes.fill(0);
    this.wiped = true;
  }

  private requireLive(): void {
    if (this.wiped) throw new WipedKeyError();
  }

  private parts(): KeyParts {
    return {
      scheme: this.scheme,
      keyData: this.keyBytes,
      initializationVector: this.ivBytes,
      salt: this.saltBytes
    };
  }
}
