import { RECOVERY_CONSTANTS } from "../constants";
import { checksumHex } from "../crypto/ChecksumCalculator";
import { FormatError, ValidationError } from "../errors";
import type { Mnemonic, QrFrame, Seed } from "../types";

const Q = RECOVERY_CONSTANTS.QR;
const CHECK_RE = new RegExp(`^${Q.CHECK_MARKER}[0-9a-f]{${Q.CHECKSUM_LEN * 2}}$`);
const WORDS_RE = /^[a-z]+( [a-z]+)*$/;
const INT_RE = /^[0-9]+$/;

function parsePositiveInt(s: string, what: string): number {
  if (!INT_RE.test(s)) throw new FormatError(`Frame ${what} is not a positive integer`);
  const n = Number.parseInt(s, 10);
  if (!Number.isSafeInteger(n) || n < 1) throw new FormatError(`Frame ${what} is not a positive integer`);
  return n;
}

function checkPayload(index: number, total: number, payload: string): void {
  if (index === total) {
    if (!CHECK_RE.test(payload)) {
      throw new FormatError(`Last frame must carry ${Q.CHECK_MARKER} and ${Q.CHECKSUM_LEN * 2} lowercase hex chars`);
    }
    return;
  }
  if (!WORDS_RE.test(payload) || payload.split(" ").length !== Q.WORDS_PER_FRAME) {
    throw new FormatError(`Frame ${index} must carry ${Q.WORDS_PER_FRAME} lowercase words`);
  }
}

/**
 * Wire codec for the animated QR transfer.
 *
 * Text form: `otp-e2ee-seed:<index>/<total>:<payload>`. Frames 1 and 2 carry
 * twelve words each, frame 3 carries `check:<hex>` (see {@link checksumHex}).
 * Frames can be shown and scanned in any order.
 */
export const QrFrameCodec = {
  split: async (mnemonic: Mnemonic, seed: Seed): Promise<QrFrame[]> => {
    const words = mnemonic.split(" ");
    const wordFrames = Q.TOTAL_FRAMES - 1;
    if (words.length !== wordFrames * Q.WORDS_PER_FRAME) {
      throw new ValidationError(`Mnemonic must have ${wordFrames * Q.WORDS_PER_FRAME} words`);
    }

    const frames: QrFrame[] = [];
    for (let i = 0; i < wordFrames; i++) {
      frames.push({
        index: i + 1,
        total: Q.TOTAL_FRAMES,
        payload: words.slice(i * Q.WORDS_PER_FRAME, (i + 1) * Q.WORDS_PER_FRAME).join(" ")
      });
    }
    frames.push({
      index: Q.TOTAL_FRAMES,
      total: Q.TOTAL_FRAMES,
      payload: `${Q.CHECK_MARKER}${await checksumHex(seed)}`
    });
    return frames;
  },

  format: (frame: QrFrame): string => `${Q.PREFIX}${frame.index}/${frame.total}:${frame.payload}`,

  splitToText: async (mnemonic: Mnemonic, seed: Seed): Promise<string[]> =>
    (await QrFrameCodec.split(mnemonic, seed)).map(QrFrameCodec.format),

  /**
   * Parses one scanned text. Throws {@link FormatError}; never returns a partial frame.
   */
  parseOne: (text: string): QrFrame => {
    if (typeof text !== "string" || !text.startsWith(Q.PREFIX)) {
      throw new FormatError("Not an identity transfer frame (prefix mismatch)");
    }

    // prefix:header:payload; the payload may contain ':' itself (check:...)
    const rest = text.slice(Q.PREFIX.length);
    const sep = rest.indexOf(":");
    if (sep === -1) throw new FormatError("Frame header/payload separator missing");
    const header = rest.slice(0, sep);
    const payload = rest.slice(sep + 1);

    const parts = header.split("/");
    if (parts.length !== 2) throw new FormatError("Frame header must be <index>/<total>");
    const index = parsePositiveInt(parts[0] ?? "", "index");
    const total = parsePositiveInt(parts[1] ?? "", "total");

    if (total !== Q.TOTAL_FRAMES) {
      throw new FormatError(`Frame total must be ${Q.TOTAL_FRAMES}, got ${total}`);
    }
    if (index > total) {
      throw new FormatError(`Frame index ${index} is outside [1, ${total}]`);
    }

    checkPayload(index, total, payload);
    return { index, total, payload };
  }
};
