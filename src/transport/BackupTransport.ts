import type { BackupParamsWire, BackupRecord } from "../types";

/**
 * Carries the opaque backup to and from the server. The server never sees
 * anything but KDF parameters and ciphertext.
 *
 * `download` resolves `null` when no backup exists for the identity.
 */
export interface BackupTransport {
  upload(params: BackupParamsWire, ciphertext: string): Promise<void>;
  download(identityRef: string): Promise<BackupRecord | null>;
}

/**
 * In-process transport keyed by identity reference. Uploads go to the
 * reference given at construction, the way an authenticated client uploads
 * for its own account.
 */
export class MemoryBackupTransport implements BackupTransport {
  private readonly records = new Map<string, BackupRecord>();

  constructor(private readonly identityRef: string) {}

  async upload(params: BackupParamsWire, ciphertext: string): Promise<void> {
    this.records.set(this.identityRef, structuredClone({ params, ciphertext }));
  }

  async download(identityRef: string): Promise<BackupRecord | null> {
    const record = this.records.get(identityRef);
    return record === undefined ? null : structuredClone(record);
  }
}
