import { defaultCryptoProvider, type CryptoProvider } from "../crypto/CryptoProvider";
import { EncryptionKey } from "../key/EncryptionKey";
import { silentLogger, type KeyLogger } from "../logging";
import { Scheme } from "../scheme/Scheme";

/**
 * Configuration options for a {@link KeyFactory}.
 */
export interface KeyFactoryOptions {
  /** Randomness, HMAC and KDF primitives. Defaults to `@noble/hashes`. */
  crypto?: CryptoProvider;
  /** Diagnostics sink. Defaults to a silent logger. */
  logger?: KeyLogger;
  /** Scheme for new random keys. Defaults to {@link Scheme.primary}. */
  scheme?: Scheme;
}

/**
 * Binds a crypto provider, logger and default scheme once, so call sites only
 * pass passwords and key material.
 */
export class KeyFactory {
  readonly crypto: CryptoProvider;
  readonly logger: KeyLogger;
  readonly scheme: Scheme;

  constructor(opts?: KeyFactoryOptions) {
    this.crypto = opts?.crypto ?? defaultCryptoProvider;
    this.logger = opts?.logger ?? silentLogger;
    this.scheme = opts?.scheme ?? Scheme.primary;
  }

  /**
   * Derives a new, non-reproducible key.
   *
   * @param password - Raw password; trimmed and NFKD-normalized before use.
   * @param additionalKeywords - Context bound into the salt, in order.
   * @param context - Optional label for the key.
   */
  random(password: string, additionalKeywords: readonly string[] = [], context?: string): EncryptionKey {
    return EncryptionKey.random(password, additionalKeywords, this.scheme, this.keyOptions(context));
  }

  fromSeed(
    password: string,
    additionalKeywords: readonly string[],
    seed: Uint8Array,
    iv: Uint8Array,
    scheme: Scheme = this.scheme,
    context?: string
  ): EncryptionKey {
    return EncryptionKey.fromSeed(password, additionalKeywords, seed, iv, scheme, this.keyOptions(context));
  }

  fromSalt(
    password: string,
    treatedSalt: Uint8Array,
    iv: Uint8Array,
    scheme: Scheme = this.scheme,
    context?: string
  ): EncryptionKey {
    return EncryptionKey.fromSalt(password, treatedSalt, iv, scheme, this.keyOptions(context));
  }

  /** The scheme comes from the data's version tag, not from this factory. */
  parse(data: Uint8Array, context?: string): EncryptionKey {
    return EncryptionKey.fromRawData(data, { logger: this.logger, context });
  }

  fromBase64(text: string, context?: string): EncryptionKey {
    return EncryptionKey.fromBase64(text, { logger: this.logger, context });
  }

  private keyOptions(context: string | undefined) {
    return { crypto: this.crypto, logger: this.logger, context };
  }
}
