import { entropyToMnemonic, mnemonicToEntropy, validateMnemonic } from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import { RECOVERY_CONSTANTS } from "../constants";
import { InvalidMnemonicError, ValidationError } from "../errors";
import type { Mnemonic, Seed } from "../types";

const WORDS = new Set(wordlist);

function assertSeed(seed: Seed): void {
  if (!(seed instanceof Uint8Array) || seed.byteLength !== RECOVERY_CONSTANTS.SEED_LEN) {
    throw new ValidationError(`Seed must be Uint8Array of length ${RECOVERY_CONSTANTS.SEED_LEN}`);
  }
}

/**
 * Checks word count, list membership and the BIP-39 checksum bits, in that order.
 * Throws the first failure; returns nothing on success.
 */
function check(mnemonic: Mnemonic): void {
  const words = typeof mnemonic === "string" ? mnemonic.split(" ") : [];
  if (words.length !== RECOVERY_CONSTANTS.MNEMONIC.WORD_COUNT) {
    throw new InvalidMnemonicError(
      "word-count",
      `Mnemonic must have ${RECOVERY_CONSTANTS.MNEMONIC.WORD_COUNT} words, got ${words.length}`
    );
  }
  const position = words.findIndex((w) => !WORDS.has(w));
  if (position !== -1) {
    throw new InvalidMnemonicError("unknown-word", `Word ${position + 1} is not in the word list`);
  }
  if (!validateMnemonic(mnemonic, wordlist)) {
    throw new InvalidMnemonicError("checksum", "Mnemonic checksum does not match");
  }
}

export const MnemonicCodec = {
  /** Seed (32 bytes) to 24 words. */
  encode: (seed: Seed): Mnemonic => {
    assertSeed(seed);
    return entropyToMnemonic(seed, wordlist);
  },

  decode: (mnemonic: Mnemonic): Seed => {
    check(mnemonic);
    const entropy = mnemonicToEntropy(mnemonic, wordlist);
    if (entropy.byteLength !== RECOVERY_CONSTANTS.SEED_LEN) {
      throw new InvalidMnemonicError("word-count", "Mnemonic does not encode a 32-byte seed");
    }
    return entropy;
  },

  validate: (mnemonic: Mnemonic): boolean => {
    try {
      check(mnemonic);
      return true;
    } catch {
      return false;
    }
  },

  /** Tidies typed-in text: trims, lower-cases, single spaces. */
  normalize: (input: string): Mnemonic => {
    if (typeof input !== "string") return "";
    return input.trim().toLowerCase().split(/\s+/).filter((w) => w.length > 0).join(" ");
  }
};
