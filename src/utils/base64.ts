import { FormatError } from "../errors";

const MAX_BASE64_LEN = 1024 * 1024;
const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function bytesToBase64(bytes: ArrayBuffer | Uint8Array): string {
  const u8 = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes);
  if (u8.byteLength === 0) return "";
  return Buffer.from(u8.buffer, u8.byteOffset, u8.byteLength).toString("base64");
}

export function base64ToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.trim().length === 0) {
    throw new FormatError("Base64 input must be a non-empty string");
  }

  // normalize: remove whitespace, convert URL-safe to standard, add padding
  const cleaned = b64.replace(/\s+/g, "").replace(/-/g, "+").replace(/_/g, "/");
  if (cleaned.length > MAX_BASE64_LEN) {
    throw new FormatError("Base64 input too large");
  }
  if (!BASE64_RE.test(cleaned) || cleaned.length % 4 === 1) {
    throw new FormatError("Invalid base64 input");
  }

  const pad = cleaned.length % 4;
  const normalized = pad === 0 ? cleaned : cleaned + "=".repeat(4 - pad);
  const buf = Buffer.from(normalized, "base64");
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}
