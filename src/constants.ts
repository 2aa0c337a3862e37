export const RECOVERY_CONSTANTS = {
  SEED_LEN: 32 as const,

  MNEMONIC: {
    WORD_COUNT: 24 as const
  },

  // Frame N carries the checksum, frames 1..N-1 carry the words
  QR: {
    PREFIX: "otp-e2ee-seed:" as const,
    TOTAL_FRAMES: 3 as const,
    WORDS_PER_FRAME: 12 as const,
    CHECK_MARKER: "check:" as const,
    CHECKSUM_LEN: 8 as const, // bytes, 16 hex chars on the wire
    FRAME_INTERVAL_MS: 700
  },

  // Argon2 (memory in KiB)
  ARGON2: {
    TYPE: "argon2id" as const,
    ITERATIONS: 2,
    MEMORY_KIB: 64 * 1024,
    PARALLELISM: 1,
    HASH_LEN: 32 as const, // AES-256 key

    MIN_ITERATIONS: 2 as const,
    MIN_MEMORY_KIB: 64 * 1024,
    MAX_ITERATIONS: 64 as const,
    MAX_MEMORY_KIB: 1024 * 1024,
    MAX_PARALLELISM: 16 as const
  },

  // Salt for Argon2
  SALT_LEN: 16 as const,

  // AES-GCM
  AES: {
    NAME: "AES-GCM" as const,
    LENGTH: 256 as const,
    NONCE_LENGTH: 12 as const, // 96-bit nonce
    MAC_LENGTH: 16 as const
  },

  STORAGE_KEY: "device_identity_seed_hex",

  LOG_LEVEL_ENV: "IDENTITY_RECOVERY_LOG_LEVEL"
};
