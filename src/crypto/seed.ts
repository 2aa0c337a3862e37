import { webcrypto } from "node:crypto";
import { RECOVERY_CONSTANTS } from "../constants";
import type { Seed } from "../types";

/** Fresh identity seed, for account creation by the host. */
export function createSeed(): Seed {
  return webcrypto.getRandomValues(new Uint8Array(RECOVERY_CONSTANTS.SEED_LEN));
}
