import type { Seed } from "../types";

/**
 * At-rest home of the identity seed, owned by the host application.
 * Both directions hand over fresh buffers: `get()` returns a copy and `set()`
 * copies or persists before resolving, since callers wipe their buffer afterwards.
 */
export interface IdentityStore {
  get(): Promise<Seed | null>;
  set(seed: Seed): Promise<void>;
}

/** Process-local store, for tests and for hosts without secure storage. */
export class MemoryIdentityStore implements IdentityStore {
  private seed: Seed | null = null;

  async get(): Promise<Seed | null> {
    return this.seed ? new Uint8Array(this.seed) : null;
  }

  async set(seed: Seed): Promise<void> {
    this.seed?.fill(0);
    this.seed = new Uint8Array(seed);
  }

  clear(): void {
    this.seed?.fill(0);
    this.seed = null;
  }
}
