import "../setup";
import { argon2id } from "@noble/hashes/argon2";
import { hmac } from "@noble/hashes/hmac";
import { pbkdf2 } from "@noble/hashes/pbkdf2";
import { sha256 } from "@noble/hashes/sha256";
import { sha512 } from "@noble/hashes/sha512";
import { utf8ToBytes } from "@noble/hashes/utils";
import { NobleCryptoProvider } from "../../src/crypto/CryptoProvider";
import { ValidationError } from "../../src/errors";
import { Format } from "../../src/scheme/Format";
import { Scheme } from "../../src/scheme/Scheme";

const te = new TextEncoder();

describe("NobleCryptoProvider.hmac", () => {
  const provider = new NobleCryptoProvider();
  const key = new Uint8Array(16).fill(3);

  it("feeds chunks into one running state", () => {
    const chunked = provider.hmac("SHA-256", key, [te.encode("alice"), te.encode("@example.com")]);
    const whole = hmac(sha256, key, utf8ToBytes("alice@example.com"));
    expect(Array.from(chunked)).toEqual(Array.from(whole));
  });

  it("uses the requested algorithm", () => {
    const out = provider.hmac("SHA-512", key, [te.encode("x")]);
    expect(out.byteLength).toBe(64);
    expect(Array.from(out)).toEqual(Array.from(hmac(sha512, key, utf8ToBytes("x"))));
  });

  it("hashes an empty message when there are no chunks", () => {
    const out = provider.hmac("SHA-256", key, []);
    expect(Array.from(out)).toEqual(Array.from(hmac(sha256, key, new Uint8Array(0))));
  });
});

describe("NobleCryptoProvider.randomBytes", () => {
  const provider = new NobleCryptoProvider();

  it("returns the requested number of bytes", () => {
    expect(provider.randomBytes(16).byteLength).toBe(16);
    expect(provider.randomBytes(0).byteLength).toBe(0);
  });

  it("does not repeat itself", () => {
    expect(Array.from(provider.randomBytes(32))).not.toEqual(Array.from(provider.randomBytes(32)));
  });

  it("rejects invalid counts", () => {
    expect(() => provider.randomBytes(-1)).toThrow(ValidationError);
    expect(() => provider.randomBytes(1.5)).toThrow(ValidationError);
  });
});

describe("NobleCryptoProvider.deriveKey", () => {
  const provider = new NobleCryptoProvider();

  it("runs PBKDF2 for v1 with the scheme's parameters", () => {
    const scheme = Scheme.forFormat(Format.V1);
    const salt = new Uint8Array(32).fill(5);
    const out = provider.deriveKey("pw", salt, scheme);

    expect(out.byteLength).toBe(32);
    expect(jest.mocked(pbkdf2)).toHaveBeenLastCalledWith(sha256, utf8ToBytes("pw"), salt, {
      c: 210_000,
      dkLen: 32
    });
  });

  it("runs Argon2id for v2 with the scheme's parameters", () => {
    const scheme = Scheme.forFormat(Format.V2);
    const salt = new Uint8Array(64).fill(5);
    const out = provider.deriveKey("pw", salt, scheme);

    expect(out.byteLength).toBe(32);
    expect(jest.mocked(argon2id)).toHaveBeenLastCalledWith(utf8ToBytes("pw"), salt, {
      t: 3,
      m: 65536,
      p: 1,
      dkLen: 32
    });
  });

  it("is deterministic and salt-dependent", () => {
    const scheme = Scheme.forFormat(Format.V1);
    const a = provider.deriveKey("pw", new Uint8Array(32).fill(1), scheme);
    const b = provider.deriveKey("pw", new Uint8Array(32).fill(1), scheme);
    const c = provider.deriveKey("pw", new Uint8Array(32).fill(2), scheme);
    expect(Array.from(a)).toEqual(Array.from(b));
    expect(Array.from(a)).not.toEqual(Array.from(c));
  });
});
