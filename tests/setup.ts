import { webcrypto as nodeCrypto } from "node:crypto";

if (!("crypto" in globalThis)) {
  Object.defineProperty(globalThis, "crypto", { value: nodeCrypto, configurable: true });
}

// The real KDFs are deliberately slow. These stand-ins keep the same call
// shape and still depend on every input, so equal inputs give equal keys and
// any changed input gives a different key.
function mockKdfLike(
  label: string,
  params: Record<string, number>,
  password: Uint8Array,
  salt: Uint8Array,
  dkLen: number
): Uint8Array {
  const { sha256 } = jest.requireActual<typeof import("@noble/hashes/sha256")>("@noble/hashes/sha256");
  const te = new TextEncoder();
  const header = te.encode(
    `${label}|` + Object.keys(params).sort().map((k) => `${k}=${params[k]}`).join("|") + "|"
  );
  const base = new Uint8Array(header.length + 4 + password.length + salt.length);
  base.set(header, 0);
  new DataView(base.buffer).setUint32(header.length, password.length, false);
  base.set(password, header.length + 4);
  base.set(salt, header.length + 4 + password.length);

  let seed = sha256(base);
  const out = new Uint8Array(dkLen);
  let offset = 0;
  let counter = 0;
  while (offset < out.length) {
    const blockIn = new Uint8Array(seed.length + 4);
    blockIn.set(seed, 0);
    new DataView(blockIn.buffer).setUint32(seed.length, counter, false);
    const block = sha256(blockIn);
    const take = Math.min(block.length, out.length - offset);
    out.set(block.subarray(0, take), offset);
    offset += take;
    counter += 1;
    seed = block;
  }
  return out;
}

jest.mock("@noble/hashes/pbkdf2", () => ({
  pbkdf2: jest.fn((
    hash: { outputLen: number },
    password: Uint8Array,
    salt: Uint8Array,
    opts: { c: number; dkLen: number }
  ) => mockKdfLike("pbkdf2", { out: hash.outputLen, c: opts.c }, password, salt, opts.dkLen))
}));

jest.mock("@noble/hashes/argon2", () => ({
  argon2id: jest.fn((
    password: Uint8Array,
    salt: Uint8Array,
    opts: { t: number; m: number; p: number; dkLen: number }
  ) => mockKdfLike("argon2id", { t: opts.t, m: opts.m, p: opts.p }, password, salt, opts.dkLen))
}));
