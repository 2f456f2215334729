import { utf8ToBytes } from "@noble/hashes/utils";
import type { CryptoProvider } from "../crypto/CryptoProvider";
import { ImproperKeyError, ValidationError } from "../errors";
import type { KeyLogger } from "../logging";
import type { Scheme } from "../scheme/Scheme";
import { assertBytes } from "../utils/bytes";

const SURROUNDING_WHITESPACE = /^\p{White_Space}+|\p{White_Space}+$/gu;

/**
 * Trims surrounding Unicode whitespace and newlines (NEL included, BOM not),
 * then applies NFKD so that compatibility-equivalent spellings of a password
 * derive the same key.
 */
export function normalizePassword(password: string): string {
  if (typeof password !== "string") {
    throw new ValidationError("Password must be a string");
  }
  return password.replace(SURROUNDING_WHITESPACE, "").normalize("NFKD");
}

export function assertKeywords(keywords: unknown): asserts keywords is readonly string[] {
  if (!Array.isArray(keywords) || !keywords.every((k) => typeof k === "string")) {
    throw new ValidationError("additionalKeywords must be an array of strings");
  }
}

type SizedField = "seedSize" | "saltSize" | "initializationVectorSize";

export function requireSize(
  field: SizedField,
  bytes: Uint8Array,
  expected: number,
  logger: KeyLogger
): void {
  if (bytes.byteLength === expected) return;
  logger.warn(`Rejected ${field}`, { expected, actual: bytes.byteLength });
  throw new ImproperKeyError({ kind: field, expected, actual: bytes.byteLength });
}

/**
 * Mixes the seed with the caller's context keywords into the salt the KDF
 * actually sees. Keyword order matters.
 */
export function treatSeed(
  seed: Uint8Array,
  additionalKeywords: readonly string[],
  scheme: Scheme,
  crypto: CryptoProvider,
  logger: KeyLogger
): Uint8Array {
  assertBytes(seed, "seed");
  assertKeywords(additionalKeywords);
  requireSize("seedSize", seed, scheme.seedSize, logger);

  const chunks = additionalKeywords.map((k) => utf8ToBytes(k));
  return crypto.hmac(scheme.hmacAlgorithm, seed, chunks);
}

/** Salt first, then IV; both before any KDF work. */
export function requireMaterialSizes(
  salt: Uint8Array,
  iv: Uint8Array,
  scheme: Scheme,
  logger: KeyLogger
): void {
  assertBytes(salt, "treatedSalt");
  assertBytes(iv, "iv");
  requireSize("saltSize", salt, scheme.stretchedSaltSize, logger);
  requireSize("initializationVectorSize", iv, scheme.initializationVectorSize, logger);
}
