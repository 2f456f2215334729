export const DK_CONSTANTS = {
  // Version tag: unsigned 16-bit, big-endian
  FORMAT: {
    DATA_SIZE: 2 as const,
    V1: 1 as const,
    V2: 2 as const,
    PRIMARY: 2 as const
  },

  V1: {
    SEED_SIZE: 16,
    IV_SIZE: 16,
    STRETCHED_SALT_SIZE: 32, // HMAC-SHA-256 output
    HMAC: "SHA-256" as const,
    KEY_SIZE: 32,
    PBKDF2: {
      HASH: "SHA-256" as const,
      ITERATIONS: 210_000
    }
  },

  V2: {
    SEED_SIZE: 32,
    IV_SIZE: 12, // 96-bit GCM nonce
    STRETCHED_SALT_SIZE: 64, // HMAC-SHA-512 output
    HMAC: "SHA-512" as const,
    KEY_SIZE: 32,
    // @noble/hashes takes memory in KiB
    ARGON2: {
      ITERATIONS: 3,
      MEMORY_KIB: 64 * 1024,
      PARALLELISM: 1
    }
  },

  HMAC_OUTPUT_SIZE: {
    "SHA-256": 32,
    "SHA-512": 64
  },

  LOG_PREFIX: "[derived-key]",

  MAX_BASE64_LEN: 1024 * 1024
} as const;
