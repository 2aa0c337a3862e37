import { IdentityRecovery, type IdentityRecoveryOptions } from "./api/IdentityRecovery";

export type { IdentityRecoveryOptions } from "./api/IdentityRecovery";
export { IdentityRecovery } from "./api/IdentityRecovery";
export { BackupFormat } from "./api/backup/BackupFormat";
export { MnemonicCodec } from "./crypto/MnemonicCodec";
export { checksum, checksumHex } from "./crypto/ChecksumCalculator";
export { PassphraseBackupCipher, type PassphraseBackupCipherOptions } from "./crypto/PassphraseBackupCipher";
export { createSeed } from "./crypto/seed";
export { QrFrameCodec } from "./qr/QrFrameCodec";
export {
  FrameAssembler,
  type AssemblerState,
  type RejectReason,
  type ScanOutcome,
  type StateListener
} from "./qr/FrameAssembler";
export { FrameCarousel, type FrameCarouselOptions } from "./qr/FrameCarousel";
export { MemoryIdentityStore, type IdentityStore } from "./storage/IdentityStore";
export {
  KeyValueIdentityStore,
  MemoryKeyValueStorage,
  type KeyValueStorage
} from "./storage/KeyValueIdentityStore";
export { MemoryBackupTransport, type BackupTransport } from "./transport/BackupTransport";
export { RECOVERY_CONSTANTS } from "./constants";
export * from "./errors";
export type {
  Argon2Params,
  BackupParamsWire,
  BackupRecord,
  EncryptedBackup,
  KdfCost,
  Mnemonic,
  QrFrame,
  Seed
} from "./types";

/**
 * Creates an {@link IdentityRecovery} instance.
 *
 * @example
 * ```typescript
 * import identityRecovery, { KeyValueIdentityStore, MemoryKeyValueStorage } from "identity-recovery";
 *
 * const recovery = identityRecovery({
 *   identityStore: new KeyValueIdentityStore(new MemoryKeyValueStorage())
 * });
 *
 * const words = await recovery.exportMnemonic();
 * const frames = await recovery.exportQrFrames(); // "otp-e2ee-seed:1/3:..."
 *
 * const session = recovery.createScanSession();
 * for (const text of frames) await session.submit(text);
 * ```
 */
export default function identityRecovery(opts: IdentityRecoveryOptions): IdentityRecovery {
  return new IdentityRecovery(opts);
}
