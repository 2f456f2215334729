export type HmacAlgorithm = "SHA-256" | "SHA-512";

export interface Pbkdf2Config {
  name: "PBKDF2";
  hash: HmacAlgorithm;
  iterations: number;
}

export interface Argon2idConfig {
  name: "Argon2id";
  iterations: number;
  memoryKib: number;   // KiB
  parallelism: number;
}

export type KdfConfig = Pbkdf2Config | Argon2idConfig;

/** Byte sizes every key built on a scheme must satisfy. */
export interface SchemeSizes {
  seedSize: number;
  initializationVectorSize: number;
  stretchedSaltSize: number;
  keySize: number;
}
