export class RecoveryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecoveryError";
  }
}

export class ValidationError extends RecoveryError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Malformed QR text, frame header, backup document or encoding. */
export class FormatError extends RecoveryError {
  constructor(message: string) {
    super(message);
    this.name = "FormatError";
  }
}

export class ChecksumMismatchError extends RecoveryError {
  constructor(message = "Transfer checksum does not match the received words") {
    super(message);
    this.name = "ChecksumMismatchError";
  }
}

export type InvalidMnemonicReason = "word-count" | "unknown-word" | "checksum";

export class InvalidMnemonicError extends RecoveryError {
  constructor(public readonly reason: InvalidMnemonicReason, message: string) {
    super(message);
    this.name = "InvalidMnemonicError";
  }
}

/**
 * Wrong passphrase and damaged ciphertext are reported identically.
 */
export class DecryptionFailedError extends RecoveryError {
  constructor() {
    super("Wrong passphrase or corrupted backup");
    this.name = "DecryptionFailedError";
  }
}

export class BackupNotFoundError extends RecoveryError {
  constructor(message = "No backup exists for this identity") {
    super(message);
    this.name = "BackupNotFoundError";
  }
}

export class MissingIdentityError extends RecoveryError {
  constructor(message = "No identity seed is stored on this device") {
    super(message);
    this.name = "MissingIdentityError";
  }
}

export class CryptoError extends RecoveryError {
  constructor(message: string) {
    super(message);
    this.name = "CryptoError";
  }
}

export class PersistenceError extends RecoveryError {
  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
  }
}
