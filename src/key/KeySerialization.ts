import { ImproperKeyError } from "../errors";
import type { KeyLogger } from "../logging";
import { decodeFormat, encodeFormat, Format } from "../scheme/Format";
import { Scheme } from "../scheme/Scheme";
import { assertBytes, concatBytes } from "../utils/bytes";

export interface KeyParts {
  scheme: Scheme;
  keyData: Uint8Array;
  initializationVector: Uint8Array;
  salt: Uint8Array;
}

// Layout: version | keyData | iv | salt

export function encodeKeyParts(parts: KeyParts): Uint8Array {
  return concatBytes(
    encodeFormat(parts.scheme.format),
    parts.keyData,
    parts.initializationVector,
    parts.salt
  );
}

/**
 * Splits a serialized key. Only the version tag has a static width, so the
 * salt and IV are cut from the tail once the version names their sizes; the
 * rest is the key payload, taken verbatim. The returned parts are views
 * into `data`.
 */
export function decodeKeyParts(data: Uint8Array, logger: KeyLogger): KeyParts {
  assertBytes(data, "data");

  const version = decodeFormat(data);
  if (version === null) {
    logger.warn("Rejected key data with unknown format tag", { length: data.byteLength });
    throw new ImproperKeyError({ kind: "badFormatData" });
  }
  const scheme = Scheme.forFormat(version);

  let rest = data.subarray(Format.dataSize);

  const saltSize = scheme.stretchedSaltSize;
  if (rest.byteLength < saltSize) {
    logger.warn("Rejected truncated key data (salt)", { version, expected: saltSize, actual: rest.byteLength });
    throw new ImproperKeyError({ kind: "saltSize", expected: saltSize, actual: rest.byteLength });
  }
  const salt = rest.subarray(rest.byteLength - saltSize);
  rest = rest.subarray(0, rest.byteLength - saltSize);

  const ivSize = scheme.initializationVectorSize;
  if (rest.byteLength < ivSize) {
    logger.warn("Rejected truncated key data (iv)", { version, expected: ivSize, actual: rest.byteLength });
    throw new ImproperKeyError({ kind: "initializationVectorSize", expected: ivSize, actual: rest.byteLength });
  }
  const initializationVector = rest.subarray(rest.byteLength - ivSize);
  rest = rest.subarray(0, rest.byteLength - ivSize);

  logger.debug("Parsed key data", { version, payloadLength: rest.byteLength });

  return {
    scheme,
    keyData: rest,
    initializationVector,
    salt
  };
}
