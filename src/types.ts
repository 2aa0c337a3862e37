/** 32 random bytes; the root identity secret. */
export type Seed = Uint8Array;

/** 24 lowercase BIP-39 words joined by single spaces. */
export type Mnemonic = string;

export interface QrFrame {
  index: number;   // 1-based
  total: number;
  payload: string; // words, or "check:<hex>" on the last frame
}

export interface Argon2Params {
  salt: Uint8Array;
  iterations: number;
  memoryKiB: number;
  parallelism: number;
  derivedKeyLength: number;
  nonceLength: number;
  macLength: number;
}

export interface EncryptedBackup {
  params: Argon2Params;
  ciphertext: string; // base64(nonce || ciphertext || tag)
}

/** Parameter block as uploaded next to the ciphertext. */
export interface BackupParamsWire {
  type: "argon2id";
  salt: string;        // base64
  iterations: number;
  memory: number;      // KiB
  parallelism: number;
  hashLength: number;
  nonceLength: number;
  macLength: number;
}

export interface BackupRecord {
  params: BackupParamsWire;
  ciphertext: string;
}

export interface KdfCost {
  iterations: number;
  memoryKiB: number;
  parallelism: number;
}
