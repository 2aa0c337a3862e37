import { webcrypto } from "node:crypto";
import { RECOVERY_CONSTANTS } from "../constants";
import { DecryptionFailedError, FormatError, ValidationError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import type { Argon2Params, EncryptedBackup, KdfCost, Seed } from "../types";
import { base64ToBytes, bytesToBase64 } from "../utils/base64";
import { asArrayBuffer, wipe } from "../utils/typedArray";
import { deriveKeyFromPassphrase } from "./KeyDerivation";

export interface PassphraseBackupCipherOptions {
  /** Argon2id cost for new backups. Cannot go below 64 MiB / 2 iterations. */
  cost?: Partial<KdfCost>;
  logger?: Logger;
}

function assertSeed(seed: Seed): void {
  if (!(seed instanceof Uint8Array) || seed.byteLength !== RECOVERY_CONSTANTS.SEED_LEN) {
    throw new ValidationError(`Seed must be Uint8Array of length ${RECOVERY_CONSTANTS.SEED_LEN}`);
  }
}

function isIntIn(v: unknown, min: number, max: number): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= min && v <= max;
}

/**
 * Rejects stored parameters this version cannot (or should not) run, before
 * any key derivation is attempted.
 */
export function assertSupportedParams(params: Argon2Params): void {
  const A = RECOVERY_CONSTANTS.ARGON2;
  if (!(params.salt instanceof Uint8Array) || params.salt.byteLength !== RECOVERY_CONSTANTS.SALT_LEN) {
    throw new FormatError(`Backup salt must be ${RECOVERY_CONSTANTS.SALT_LEN} bytes`);
  }
  if (!isIntIn(params.iterations, 1, A.MAX_ITERATIONS)) {
    throw new FormatError(`Backup iterations must be an integer in [1, ${A.MAX_ITERATIONS}]`);
  }
  if (!isIntIn(params.parallelism, 1, A.MAX_PARALLELISM)) {
    throw new FormatError(`Backup parallelism must be an integer in [1, ${A.MAX_PARALLELISM}]`);
  }
  // argon2 needs at least 8 KiB per lane
  if (!isIntIn(params.memoryKiB, 8 * params.parallelism, A.MAX_MEMORY_KIB)) {
    throw new FormatError(`Backup memory must be an integer in [${8 * params.parallelism}, ${A.MAX_MEMORY_KIB}] KiB`);
  }
  if (params.derivedKeyLength !== A.HASH_LEN) {
    throw new FormatError(`Unsupported derived key length ${String(params.derivedKeyLength)}`);
  }
  if (params.nonceLength !== RECOVERY_CONSTANTS.AES.NONCE_LENGTH) {
    throw new FormatError(`Unsupported nonce length ${String(params.nonceLength)}`);
  }
  if (params.macLength !== RECOVERY_CONSTANTS.AES.MAC_LENGTH) {
    throw new FormatError(`Unsupported tag length ${String(params.macLength)}`);
  }
}

/**
 * Seals the identity seed under a passphrase for server-side storage.
 *
 * @remarks
 * - Key: Argon2id over the passphrase with a fresh 16-byte salt per backup.
 * - Cipher: AES-256-GCM, fresh 96-bit nonce, 128-bit tag; blob is `base64(nonce || ct || tag)`.
 * - Every cost parameter travels with the backup, so raising the defaults later
 *   does not strand old backups.
 * - Any failure to open a blob is a {@link DecryptionFailedError} with one fixed
 *   message, whether the passphrase was wrong or the bytes were damaged.
 */
export class PassphraseBackupCipher {
  private readonly cost: KdfCost;
  private readonly log: Logger;

  constructor(opts?: PassphraseBackupCipherOptions) {
    const A = RECOVERY_CONSTANTS.ARGON2;
    this.cost = {
      iterations: opts?.cost?.iterations ?? A.ITERATIONS,
      memoryKiB: opts?.cost?.memoryKiB ?? A.MEMORY_KIB,
      parallelism: opts?.cost?.parallelism ?? A.PARALLELISM
    };
    this.log = componentLogger("backup-cipher", opts?.logger);

    if (!isIntIn(this.cost.iterations, A.MIN_ITERATIONS, A.MAX_ITERATIONS)) {
      throw new ValidationError(`iterations must be an integer in [${A.MIN_ITERATIONS}, ${A.MAX_ITERATIONS}]`);
    }
    if (!isIntIn(this.cost.memoryKiB, A.MIN_MEMORY_KIB, A.MAX_MEMORY_KIB)) {
      throw new ValidationError(`memoryKiB must be an integer in [${A.MIN_MEMORY_KIB}, ${A.MAX_MEMORY_KIB}]`);
    }
    if (!isIntIn(this.cost.parallelism, 1, A.MAX_PARALLELISM)) {
      throw new ValidationError(`parallelism must be an integer in [1, ${A.MAX_PARALLELISM}]`);
    }
  }

  /** Cost applied to new backups. */
  getCost(): KdfCost {
    return { ...this.cost };
  }

  async encrypt(seed: Seed, passphrase: string): Promise<EncryptedBackup> {
    assertSeed(seed);

    const params: Argon2Params = {
      salt: webcrypto.getRandomValues(new Uint8Array(RECOVERY_CONSTANTS.SALT_LEN)),
      iterations: this.cost.iterations,
      memoryKiB: this.cost.memoryKiB,
      parallelism: this.cost.parallelism,
      derivedKeyLength: RECOVERY_CONSTANTS.ARGON2.HASH_LEN,
      nonceLength: RECOVERY_CONSTANTS.AES.NONCE_LENGTH,
      macLength: RECOVERY_CONSTANTS.AES.MAC_LENGTH
    };

    this.log.debug(
      { iterations: params.iterations, memoryKiB: params.memoryKiB, parallelism: params.parallelism },
      "deriving backup key"
    );
    const key = await deriveKeyFromPassphrase(passphrase, params);

    const nonce = webcrypto.getRandomValues(new Uint8Array(params.nonceLength));
    const sealed = new Uint8Array(
      await webcrypto.subtle.encrypt(
        { name: RECOVERY_CONSTANTS.AES.NAME, iv: nonce, tagLength: params.macLength * 8 },
        key,
        asArrayBuffer(seed)
      )
    );

    const blob = new Uint8Array(nonce.byteLength + sealed.byteLength);
    blob.set(nonce, 0);
    blob.set(sealed, nonce.byteLength);
    const ciphertext = bytesToBase64(blob);
    wipe(blob, sealed);

    this.log.info("backup sealed");
    return { params, ciphertext };
  }

  /**
   * Re-derives the key from the stored parameters and opens the blob.
   *
   * @throws {FormatError} If the stored parameters are outside supported bounds.
   * @throws {DecryptionFailedError} If the blob does not authenticate under this passphrase.
   */
  async decrypt(backup: EncryptedBackup, passphrase: string): Promise<Seed> {
    const { params } = backup;
    assertSupportedParams(params);

    // the key is derived for every blob, well-formed or not
    const key = await deriveKeyFromPassphrase(passphrase, params);
    const blob = this.readBlob(backup.ciphertext, params);
    if (!blob) throw new DecryptionFailedError();

    let plain: ArrayBuffer;
    try {
      plain = await webcrypto.subtle.decrypt(
        {
          name: RECOVERY_CONSTANTS.AES.NAME,
          iv: blob.slice(0, params.nonceLength),
          tagLength: params.macLength * 8
        },
        key,
        asArrayBuffer(blob.subarray(params.nonceLength))
      );
    } catch {
      this.log.warn("backup did not authenticate");
      throw new DecryptionFailedError();
    }

    this.log.info("backup opened");
    return new Uint8Array(plain);
  }

  private readBlob(ciphertext: string, params: Argon2Params): Uint8Array | null {
    let blob: Uint8Array;
    try {
      blob = base64ToBytes(ciphertext);
    } catch {
      return null;
    }
    const expectedLen = params.nonceLength + RECOVERY_CONSTANTS.SEED_LEN + params.macLength;
    return blob.byteLength === expectedLen ? blob : null;
  }
}
