import { DK_CONSTANTS } from "../constants";
import { ValidationError } from "../errors";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function bytesToBase64(bytes: Uint8Array): string {
  if (bytes.byteLength === 0) return "";
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

/**
 * Accepts standard or URL-safe base64, with or without padding. Whitespace
 * is ignored.
 */
export function base64ToBytes(b64: string): Uint8Array {
  if (typeof b64 !== "string" || b64.trim().length === 0) {
    throw new ValidationError("Base64 input must be a non-empty string");
  }

  const cleaned = b64.replace(/\s+/g, "").replace(/-/g, "+").replace(/_/g, "/");
  if (cleaned.length > DK_CONSTANTS.MAX_BASE64_LEN) {
    throw new ValidationError("Base64 input too large");
  }

  const pad = cleaned.length % 4;
  const dataLength = cleaned.replace(/=+$/, "").length;
  if (pad === 1 || dataLength % 4 === 1 || !BASE64_RE.test(cleaned)) {
    throw new ValidationError("Invalid base64 input");
  }
  const normalized = pad === 0 ? cleaned : cleaned + "=".repeat(4 - pad);

  const buf = Buffer.from(normalized, "base64");
  const out = new Uint8Array(buf.byteLength);
  out.set(buf);
  return out;
}
