import { webcrypto } from "node:crypto";
import * as argon2 from "argon2";
import { RECOVERY_CONSTANTS } from "../constants";
import { CryptoError, ValidationError } from "../errors";
import type { Argon2Params } from "../types";
import { asArrayBuffer, wipe } from "../utils/typedArray";

/**
 * Derives the backup key from a passphrase with Argon2id, using exactly the
 * parameters given (stored ones on decrypt, fresh ones on encrypt).
 * The hash runs on the libuv threadpool, so scan callbacks and timers keep
 * running meanwhile. The raw hash is wiped once imported into a
 * non-extractable AES-GCM key.
 */
export async function deriveKeyFromPassphrase(
  passphrase: string,
  params: Argon2Params
): Promise<webcrypto.CryptoKey> {
  if (typeof passphrase !== "string" || passphrase.trim().length === 0) {
    throw new ValidationError("Passphrase must be a non-empty string");
  }

  if (!(params.salt instanceof Uint8Array) || params.salt.byteLength !== RECOVERY_CONSTANTS.SALT_LEN) {
    throw new ValidationError(`Salt must be Uint8Array of length ${RECOVERY_CONSTANTS.SALT_LEN}`);
  }

  if (params.derivedKeyLength !== RECOVERY_CONSTANTS.ARGON2.HASH_LEN) {
    throw new ValidationError(`Derived key length must be ${RECOVERY_CONSTANTS.ARGON2.HASH_LEN} bytes`);
  }

  let hash: Uint8Array;
  try {
    hash = await argon2.hash(passphrase, {
      type: argon2.argon2id,
      salt: Buffer.from(params.salt),
      timeCost: params.iterations,
      memoryCost: params.memoryKiB,
      parallelism: params.parallelism,
      hashLength: params.derivedKeyLength,
      raw: true
    });
  } catch (e) {
    throw new CryptoError(`Argon2 derivation failed: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!(hash instanceof Uint8Array) || hash.byteLength !== params.derivedKeyLength) {
    throw new CryptoError(
      `Argon2 returned invalid hash size (expected ${params.derivedKeyLength} bytes)`
    );
  }

  try {
    return await webcrypto.subtle.importKey(
      "raw",
      asArrayBuffer(hash),
      { name: RECOVERY_CONSTANTS.AES.NAME, length: RECOVERY_CONSTANTS.AES.LENGTH },
      false,
      ["encrypt", "decrypt"]
    );
  } catch (e) {
    throw new CryptoError(`Failed to import derived key: ${e instanceof Error ? e.message : String(e)}`);
  } finally {
    wipe(hash);
  }
}
