/**
 * Export and import flows for the identity seed.
 *
 * @packageDocumentation
 *
 * @remarks
 * Three ways out and back in:
 * - **Mnemonic**: 24 BIP-39 words shown to the user and typed back in.
 * - **QR transfer**: three frames cycled on the exporting device and scanned,
 *   in any order, by a {@link FrameAssembler} on the importing device.
 * - **Passphrase backup**: Argon2id + AES-256-GCM blob uploaded through a
 *   {@link BackupTransport}, downloaded and opened on the new device.
 *
 * The seed is written to the {@link IdentityStore} only after a path has fully
 * verified it: decoded mnemonic with matching checksum, matching transfer tag,
 * or an authenticated decrypt.
 *
 * Error taxonomy:
 * - {@link FormatError}: malformed frame text, backup document or parameters.
 * - {@link InvalidMnemonicError}: word count, unknown word, checksum bits.
 * - {@link ChecksumMismatchError}: transfer tag differs (reported through scan outcomes).
 * - {@link DecryptionFailedError}: wrong passphrase or corrupted backup, indistinguishably.
 * - {@link BackupNotFoundError}: the transport holds no backup for the identity.
 * - {@link MissingIdentityError}: export requested with nothing stored.
 */

import { RECOVERY_CONSTANTS } from "../constants";
import { MnemonicCodec } from "../crypto/MnemonicCodec";
import { PassphraseBackupCipher } from "../crypto/PassphraseBackupCipher";
import { BackupNotFoundError, MissingIdentityError, ValidationError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import { FrameAssembler } from "../qr/FrameAssembler";
import { FrameCarousel } from "../qr/FrameCarousel";
import { QrFrameCodec } from "../qr/QrFrameCodec";
import type { IdentityStore } from "../storage/IdentityStore";
import type { BackupTransport } from "../transport/BackupTransport";
import type { KdfCost, Mnemonic, Seed } from "../types";
import { wipe } from "../utils/typedArray";
import { BackupFormat } from "./backup/BackupFormat";

/**
 * Configuration for {@link IdentityRecovery}.
 */
export interface IdentityRecoveryOptions {
  identityStore: IdentityStore;

  /** Required only for {@link IdentityRecovery.uploadBackup} and {@link IdentityRecovery.restoreBackup}. */
  backupTransport?: BackupTransport;

  /**
   * Argon2id cost for new backups.
   *
   * @defaultValue 64 MiB, 2 iterations, parallelism 1 (see {@link RECOVERY_CONSTANTS.ARGON2})
   *
   * @remarks
   * Old backups keep opening after a change: their own parameters travel with them.
   */
  kdf?: Partial<KdfCost>;

  /** Carousel rotation for {@link IdentityRecovery.createCarousel}. */
  frameIntervalMs?: number;

  logger?: Logger;
}

export class IdentityRecovery {
  private readonly store: IdentityStore;
  private readonly transport: BackupTransport | null;
  private readonly cipher: PassphraseBackupCipher;
  private readonly frameIntervalMs: number;
  private readonly logger: Logger | undefined;
  private readonly log: Logger;

  constructor(opts: IdentityRecoveryOptions) {
    this.store = opts.identityStore;
    this.transport = opts.backupTransport ?? null;
    this.logger = opts.logger;
    this.log = componentLogger("identity-recovery", opts.logger);
    this.cipher = new PassphraseBackupCipher({ cost: opts.kdf, logger: opts.logger });
    this.frameIntervalMs = opts.frameIntervalMs ?? RECOVERY_CONSTANTS.QR.FRAME_INTERVAL_MS;
  }

  // --------------------------- export ---------------------------

  /**
   * @throws {MissingIdentityError} If no seed is stored.
   */
  async exportMnemonic(): Promise<Mnemonic> {
    return this.withSeed(async (seed) => MnemonicCodec.encode(seed));
  }

  /** Formatted frame texts, in display order. */
  async exportQrFrames(): Promise<string[]> {
    return this.withSeed(async (seed) => QrFrameCodec.splitToText(MnemonicCodec.encode(seed), seed));
  }

  /** Exported frames wrapped in a carousel; call `start()` to begin cycling. */
  async createCarousel(): Promise<FrameCarousel> {
    return new FrameCarousel(await this.exportQrFrames(), { intervalMs: this.frameIntervalMs });
  }

  /**
   * Seals the stored seed under `passphrase` and uploads it.
   * A fresh salt and nonce are drawn on every call.
   */
  async uploadBackup(passphrase: string): Promise<void> {
    const transport = this.requireTransport();
    const backup = await this.withSeed((seed) => this.cipher.encrypt(seed, passphrase));
    const record = BackupFormat.toRecord(backup);
    await transport.upload(record.params, record.ciphertext);
    this.log.info("encrypted backup uploaded");
  }

  // --------------------------- import ---------------------------

  /**
   * Verifies typed-in words and stores the seed they encode.
   *
   * @throws {InvalidMnemonicError} Nothing is stored.
   */
  async importMnemonic(input: string): Promise<void> {
    const seed = MnemonicCodec.decode(MnemonicCodec.normalize(input));
    try {
      await this.store.set(seed);
    } finally {
      wipe(seed);
    }
    this.log.info("identity imported from mnemonic");
  }

  /** New scanning session writing to this instance's identity store. */
  createScanSession(): FrameAssembler {
    return new FrameAssembler(this.store, { logger: this.logger });
  }

  /**
   * Downloads, opens and stores the backup of `identityRef`.
   *
   * @throws {BackupNotFoundError} If the transport has no backup for `identityRef`.
   * @throws {DecryptionFailedError} If the passphrase is wrong or the blob is damaged.
   * @throws {FormatError} If the downloaded record is malformed.
   */
  async restoreBackup(identityRef: string, passphrase: string): Promise<void> {
    const transport = this.requireTransport();
    const record = await transport.download(identityRef);
    if (!record) throw new BackupNotFoundError();

    const seed = await this.cipher.decrypt(BackupFormat.fromRecord(record), passphrase);
    try {
      await this.store.set(seed);
    } finally {
      wipe(seed);
    }
    this.log.info("identity restored from encrypted backup");
  }

  // --------------------------- internals ---------------------------

  private async withSeed<T>(fn: (seed: Seed) => Promise<T>): Promise<T> {
    const seed = await this.store.get();
    if (!seed) throw new MissingIdentityError();
    try {
      return await fn(seed);
    } finally {
      wipe(seed);
    }
  }

  private requireTransport(): BackupTransport {
    if (!this.transport) {
      throw new ValidationError("No backup transport configured");
    }
    return this.transport;
  }
}
