import { webcrypto } from "node:crypto";
import { bytesToHex } from "@noble/hashes/utils";
import { RECOVERY_CONSTANTS } from "../constants";
import { CryptoError, ValidationError } from "../errors";
import type { Seed } from "../types";
import { asArrayBuffer } from "../utils/typedArray";

/**
 * Transfer checksum carried in the last QR frame: HMAC-SHA256 over the seed,
 * keyed by the seed itself, truncated to 8 bytes.
 *
 * @remarks
 * This is an integrity check, not authentication. Whoever holds the word frames
 * holds the seed and can compute a matching tag, so an attacker who controls the
 * displayed frames can forge all three. It only catches transcription errors and
 * corrupted scans between two devices that end up with the same seed.
 *
 * The seed is used as the HMAC key directly on both export and import; no
 * derived subkey.
 */
export async function checksum(seed: Seed): Promise<Uint8Array> {
  if (!(seed instanceof Uint8Array) || seed.byteLength !== RECOVERY_CONSTANTS.SEED_LEN) {
    throw new ValidationError(`Seed must be Uint8Array of length ${RECOVERY_CONSTANTS.SEED_LEN}`);
  }

  let mac: ArrayBuffer;
  try {
    const key = await webcrypto.subtle.importKey(
      "raw",
      asArrayBuffer(seed),
      { name: "HMAC", hash: "SHA-256" },
      false,
      ["sign"]
    );
    mac = await webcrypto.subtle.sign("HMAC", key, asArrayBuffer(seed));
  } catch (e) {
    throw new CryptoError(`HMAC computation failed: ${e instanceof Error ? e.message : String(e)}`);
  }

  return new Uint8Array(mac.slice(0, RECOVERY_CONSTANTS.QR.CHECKSUM_LEN));
}

/** Lowercase hex form used in the `check:` payload. */
export async function checksumHex(seed: Seed): Promise<string> {
  return bytesToHex(await checksum(seed));
}
