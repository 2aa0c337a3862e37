import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { RECOVERY_CONSTANTS } from "../constants";
import { PersistenceError, ValidationError } from "../errors";
import { componentLogger, type Logger } from "../logger";
import type { Seed } from "../types";
import type { IdentityStore } from "./IdentityStore";

/** The subset of the Web Storage API the store needs. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export class MemoryKeyValueStorage implements KeyValueStorage {
  private map = new Map<string, string>();

  getItem(key: string): string | null {
    return this.map.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.map.set(key, String(value));
  }

  removeItem(key: string): void {
    this.map.delete(key);
  }
}

export interface KeyValueIdentityStoreOptions {
  storageKey?: string;
  logger?: Logger;
}

const SEED_HEX_RE = new RegExp(`^[0-9a-f]{${RECOVERY_CONSTANTS.SEED_LEN * 2}}$`);

/**
 * Keeps the seed as lowercase hex under one key of a key/value backend.
 * A stored value of the wrong shape reads as "no identity".
 */
export class KeyValueIdentityStore implements IdentityStore {
  private readonly key: string;
  private readonly log: Logger;

  constructor(private readonly storage: KeyValueStorage, opts?: KeyValueIdentityStoreOptions) {
    this.key = opts?.storageKey ?? RECOVERY_CONSTANTS.STORAGE_KEY;
    this.log = componentLogger("identity-store", opts?.logger);
  }

  async get(): Promise<Seed | null> {
    const raw = this.storage.getItem(this.key);
    if (!raw) return null;
    if (!SEED_HEX_RE.test(raw)) {
      this.log.warn({ storageKey: this.key }, "stored identity has an invalid shape; ignoring it");
      return null;
    }
    return hexToBytes(raw);
  }

  async set(seed: Seed): Promise<void> {
    if (!(seed instanceof Uint8Array) || seed.byteLength !== RECOVERY_CONSTANTS.SEED_LEN) {
      throw new ValidationError(`Seed must be Uint8Array of length ${RECOVERY_CONSTANTS.SEED_LEN}`);
    }
    const serialized = bytesToHex(seed);
    const previous = this.storage.getItem(this.key);
    try {
      this.storage.setItem(this.key, serialized);
      const check = this.storage.getItem(this.key);
      if (check !== serialized) {
        throw new PersistenceError("Failed to persist identity (integrity check)");
      }
    } catch (e) {
      this.rollback(previous);
      if (e instanceof PersistenceError) throw e;
      throw new PersistenceError(`Failed to persist identity: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  /** Puts back what was stored before a failed write; removes the key if that fails too. */
  private rollback(previous: string | null): void {
    try {
      if (previous === null) {
        this.storage.removeItem(this.key);
        return;
      }
      this.storage.setItem(this.key, previous);
      if (this.storage.getItem(this.key) !== previous) this.storage.removeItem(this.key);
    } catch (e) {
      this.log.error({ err: e, storageKey: this.key }, "could not restore the previous identity; removing it");
      try {
        this.storage.removeItem(this.key);
      } catch (removeErr) {
        this.log.error({ err: removeErr, storageKey: this.key }, "could not remove a failed identity write");
      }
    }
  }

  clear(): void {
    this.storage.removeItem(this.key);
  }
}
