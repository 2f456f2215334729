import { argon2id } from "@noble/hashes/argon2";
import { hmac } from "@noble/hashes/hmac";
import { pbkdf2 } from "@noble/hashes/pbkdf2";
import { sha256 } from "@noble/hashes/sha256";
import { sha512 } from "@noble/hashes/sha512";
import { randomBytes, utf8ToBytes, type CHash } from "@noble/hashes/utils";
import { ValidationError } from "../errors";
import type { Scheme } from "../scheme/Scheme";
import type { HmacAlgorithm } from "../types";

/**
 * The primitives key derivation depends on. Swap in a fixed implementation to
 * make random derivation reproducible in tests.
 */
export interface CryptoProvider {
  randomBytes(count: number): Uint8Array;
  /** One running HMAC state keyed by `key`, fed each chunk in order. */
  hmac(algorithm: HmacAlgorithm, key: Uint8Array, chunks: readonly Uint8Array[]): Uint8Array;
  deriveKey(password: string, salt: Uint8Array, scheme: Scheme): Uint8Array;
}

function hashFor(algorithm: HmacAlgorithm): CHash {
  return algorithm === "SHA-512" ? sha512 : sha256;
}

export class NobleCryptoProvider implements CryptoProvider {
  randomBytes(count: number): Uint8Array {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`Random byte count must be a non-negative integer (got ${count})`);
    }
    return count === 0 ? new Uint8Array(0) : randomBytes(count);
  }

  hmac(algorithm: HmacAlgorithm, key: Uint8Array, chunks: readonly Uint8Array[]): Uint8Array {
    const state = hmac.create(hashFor(algorithm), key);
    for (const chunk of chunks) state.update(chunk);
    return state.digest();
  }

  deriveKey(password: string, salt: Uint8Array, scheme: Scheme): Uint8Array {
    const pass = utf8ToBytes(password);
    const kdf = scheme.kdf;
    switch (kdf.name) {
      case "PBKDF2":
        return pbkdf2(hashFor(kdf.hash), pass, salt, { c: kdf.iterations, dkLen: scheme.keySize });
      case "Argon2id":
        return argon2id(pass, salt, {
          t: kdf.iterations,
          m: kdf.memoryKib,
          p: kdf.parallelism,
          dkLen: scheme.keySize
        });
    }
  }
}

export const defaultCryptoProvider: CryptoProvider = new NobleCryptoProvider();
