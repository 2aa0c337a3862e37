// BackupFormat.ts
import { RECOVERY_CONSTANTS } from "../../constants";
import { FormatError } from "../../errors";
import type { Argon2Params, BackupParamsWire, BackupRecord, EncryptedBackup } from "../../types";
import { base64ToBytes, bytesToBase64 } from "../../utils/base64";

const MAX_BACKUP_CHARS = 64 * 1024;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function readInt(obj: Record<string, unknown>, field: keyof BackupParamsWire): number {
  const v = obj[field];
  if (typeof v !== "number" || !Number.isInteger(v) || v < 1) {
    throw new FormatError(`Backup parameter "${field}" must be a positive integer`);
  }
  return v;
}

export const BackupFormat = {
  toWireParams: (params: Argon2Params): BackupParamsWire => ({
    type: RECOVERY_CONSTANTS.ARGON2.TYPE,
    salt: bytesToBase64(params.salt),
    iterations: params.iterations,
    memory: params.memoryKiB,
    parallelism: params.parallelism,
    hashLength: params.derivedKeyLength,
    nonceLength: params.nonceLength,
    macLength: params.macLength
  }),

  /** Structural check only; range checks belong to the cipher. */
  fromWireParams: (raw: unknown): Argon2Params => {
    if (!isRecord(raw)) throw new FormatError("Backup parameters must be an object");
    if (raw.type !== RECOVERY_CONSTANTS.ARGON2.TYPE) {
      throw new FormatError(`Unsupported key derivation "${String(raw.type)}"`);
    }
    if (typeof raw.salt !== "string") throw new FormatError("Backup salt must be a base64 string");

    return {
      salt: base64ToBytes(raw.salt),
      iterations: readInt(raw, "iterations"),
      memoryKiB: readInt(raw, "memory"),
      parallelism: readInt(raw, "parallelism"),
      derivedKeyLength: readInt(raw, "hashLength"),
      nonceLength: readInt(raw, "nonceLength"),
      macLength: readInt(raw, "macLength")
    };
  },

  toRecord: (backup: EncryptedBackup): BackupRecord => ({
    params: BackupFormat.toWireParams(backup.params),
    ciphertext: backup.ciphertext
  }),

  fromRecord: (record: unknown): EncryptedBackup => {
    if (!isRecord(record)) throw new FormatError("Invalid backup structure");
    if (typeof record.ciphertext !== "string" || record.ciphertext.length === 0) {
      throw new FormatError("Backup ciphertext must be a non-empty string");
    }
    return { params: BackupFormat.fromWireParams(record.params), ciphertext: record.ciphertext };
  },

  /** Single JSON document `{ params, ciphertext }`, e.g. for a file download. */
  serialize: (backup: EncryptedBackup): string => JSON.stringify(BackupFormat.toRecord(backup)),

  parse: (json: string): EncryptedBackup => {
    if (typeof json !== "string" || json.length === 0) {
      throw new FormatError("Backup payload must be a non-empty string");
    }
    if (json.length > MAX_BACKUP_CHARS) {
      throw new FormatError("Backup payload too large");
    }
    let t: unknown;
    try { t = JSON.parse(json); } catch { throw new FormatError("Invalid backup structure"); }
    return BackupFormat.fromRecord(t);
  }
};
