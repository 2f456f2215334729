import { DK_CONSTANTS } from "../constants";

export type Format = typeof DK_CONSTANTS.FORMAT.V1 | typeof DK_CONSTANTS.FORMAT.V2;

const KNOWN_FORMATS: readonly Format[] = [DK_CONSTANTS.FORMAT.V1, DK_CONSTANTS.FORMAT.V2];
const PRIMARY_FORMAT: Format = DK_CONSTANTS.FORMAT.PRIMARY;

/**
 * Version tag written at the head of every serialized key.
 * The tag has a fixed width so it can be read before the scheme is known.
 */
export const Format = {
  V1: DK_CONSTANTS.FORMAT.V1,
  V2: DK_CONSTANTS.FORMAT.V2,
  primary: PRIMARY_FORMAT,
  dataSize: DK_CONSTANTS.FORMAT.DATA_SIZE,
  all: KNOWN_FORMATS
} as const;

export function isFormat(value: unknown): value is Format {
  return typeof value === "number" && KNOWN_FORMATS.some((f) => f === value);
}

export function encodeFormat(format: Format): Uint8Array {
  const out = new Uint8Array(Format.dataSize);
  out[0] = (format >>> 8) & 0xff;
  out[1] = format & 0xff;
  return out;
}

/** Reads the leading tag; `null` when it is truncated or unknown. */
export function decodeFormat(bytes: Uint8Array): Format | null {
  if (bytes.byteLength < Format.dataSize) return null;
  const value = ((bytes[0] ?? 0) << 8) | (bytes[1] ?? 0);
  return isFormat(value) ? value : null;
}
