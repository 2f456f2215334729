import { DK_CONSTANTS } from "../constants";
import { SchemeError } from "../errors";
import type { CryptoProvider } from "../crypto/CryptoProvider";
import type { HmacAlgorithm, KdfConfig, SchemeSizes } from "../types";
import { Format, isFormat } from "./Format";

export interface SchemeDefinition extends SchemeSizes {
  format: Format;
  hmacAlgorithm: HmacAlgorithm;
  kdf: KdfConfig;
}

/**
 * A versioned bundle of algorithm identifiers and required byte sizes.
 *
 * Sizes are a pure function of the format version, so a serialized key only
 * needs to carry its version tag for a parser to recover every boundary.
 */
export class Scheme implements SchemeDefinition {
  readonly format: Format;
  readonly seedSize: number;
  readonly initializationVectorSize: number;
  readonly stretchedSaltSize: number;
  readonly keySize: number;
  readonly hmacAlgorithm: HmacAlgorithm;
  readonly kdf: KdfConfig;

  constructor(def: SchemeDefinition) {
    this.format = def.format;
    this.seedSize = def.seedSize;
    this.initializationVectorSize = def.initializationVectorSize;
    this.stretchedSaltSize = def.stretchedSaltSize;
    this.keySize = def.keySize;
    this.hmacAlgorithm = def.hmacAlgorithm;
    this.kdf = Object.freeze({ ...def.kdf });
    Object.freeze(this);
  }

  static forFormat(format: Format): Scheme {
    return format === Format.V1 ? SCHEME_V1 : SCHEME_V2;
  }

  static get primary(): Scheme {
    return Scheme.forFormat(Format.primary);
  }

  equals(other: Scheme): boolean {
    return (
      this.format === other.format &&
      this.seedSize === other.seedSize &&
      this.initializationVectorSize === other.initializationVectorSize &&
      this.stretchedSaltSize === other.stretchedSaltSize &&
      this.keySize === other.keySize &&
      this.hmacAlgorithm === other.hmacAlgorithm &&
      sameKdf(this.kdf, other.kdf)
    );
  }

  deriveKey(password: string, salt: Uint8Array, provider: CryptoProvider): Uint8Array {
    return provider.deriveKey(password, salt, this);
  }
}

const SCHEME_V1 = new Scheme({
  format: Format.V1,
  seedSize: DK_CONSTANTS.V1.SEED_SIZE,
  initializationVectorSize: DK_CONSTANTS.V1.IV_SIZE,
  stretchedSaltSize: DK_CONSTANTS.V1.STRETCHED_SALT_SIZE,
  keySize: DK_CONSTANTS.V1.KEY_SIZE,
  hmacAlgorithm: DK_CONSTANTS.V1.HMAC,
  kdf: {
    name: "PBKDF2",
    hash: DK_CONSTANTS.V1.PBKDF2.HASH,
    iterations: DK_CONSTANTS.V1.PBKDF2.ITERATIONS
  }
});

const SCHEME_V2 = new Scheme({
  format: Format.V2,
  seedSize: DK_CONSTANTS.V2.SEED_SIZE,
  initializationVectorSize: DK_CONSTANTS.V2.IV_SIZE,
  stretchedSaltSize: DK_CONSTANTS.V2.STRETCHED_SALT_SIZE,
  keySize: DK_CONSTANTS.V2.KEY_SIZE,
  hmacAlgorithm: DK_CONSTANTS.V2.HMAC,
  kdf: {
    name: "Argon2id",
    iterations: DK_CONSTANTS.V2.ARGON2.ITERATIONS,
    memoryKib: DK_CONSTANTS.V2.ARGON2.MEMORY_KIB,
    parallelism: DK_CONSTANTS.V2.ARGON2.PARALLELISM
  }
});

function sameKdf(a: KdfConfig, b: KdfConfig): boolean {
  if (a.name === "PBKDF2" && b.name === "PBKDF2") {
    return a.hash === b.hash && a.iterations === b.iterations;
  }
  if (a.name === "Argon2id" && b.name === "Argon2id") {
    return a.iterations === b.iterations && a.memoryKib === b.memoryKib && a.parallelism === b.parallelism;
  }
  return false;
}

export function hmacOutputSize(algorithm: HmacAlgorithm): number {
  return DK_CONSTANTS.HMAC_OUTPUT_SIZE[algorithm];
}

function isSize(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

/**
 * Throws `SchemeError` unless `scheme` is the built-in definition of its
 * version. A key only carries its version tag, so any other sizes would be
 * cut at the wrong boundaries when the key is parsed back.
 */
export function assertKnownScheme(scheme: Scheme): void {
  if (!isFormat(scheme.format)) {
    throw new SchemeError(`Unknown scheme version ${String(scheme.format)}`);
  }
  if (!scheme.equals(Scheme.forFormat(scheme.format))) {
    throw new SchemeError(`Scheme v${scheme.format} does not match the built-in definition of that version`);
  }
}

/**
 * Throws `SchemeError` unless the scheme's sizes agree with each other.
 * A seed-derived salt is an HMAC digest, so its size is fixed by the algorithm.
 */
export function assertSchemeConsistent(scheme: SchemeDefinition): void {
  const sizes: Array<[string, number]> = [
    ["seedSize", scheme.seedSize],
    ["initializationVectorSize", scheme.initializationVectorSize],
    ["stretchedSaltSize", scheme.stretchedSaltSize],
    ["keySize", scheme.keySize]
  ];
  for (const [name, value] of sizes) {
    if (!isSize(value)) {
      throw new SchemeError(`Scheme v${scheme.format}: ${name} must be a non-negative integer (got ${value})`);
    }
  }

  const digest = hmacOutputSize(scheme.hmacAlgorithm);
  if (digest !== scheme.stretchedSaltSize) {
    throw new SchemeError(
      `Scheme v${scheme.format}: stretchedSaltSize ${scheme.stretchedSaltSize} does not match ${scheme.hmacAlgorithm} output (${digest} bytes)`
    );
  }
}
