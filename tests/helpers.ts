import { NobleCryptoProvider } from "../src/crypto/CryptoProvider";
import { ImproperKeyError, type ImproperKeyDetail } from "../src/errors";
import type { KeyLogger } from "../src/logging";

/** Hands out queued byte strings instead of random ones. */
export class FixedCryptoProvider extends NobleCryptoProvider {
  private readonly queue: Uint8Array[];

  constructor(...outputs: Uint8Array[]) {
    super();
    this.queue = outputs.map((o) => Uint8Array.from(o));
  }

  randomBytes(count: number): Uint8Array {
    const next = this.queue.shift();
    if (!next) throw new Error(`FixedCryptoProvider exhausted (asked for ${count} bytes)`);
    return next;
  }
}

export function filled(length: number, value: number): Uint8Array {
  return new Uint8Array(length).fill(value);
}

export function recordingLogger(): KeyLogger & { entries: Array<{ level: string; message: string; data?: Record<string, unknown> }> } {
  const entries: Array<{ level: string; message: string; data?: Record<string, unknown> }> = [];
  return {
    entries,
    debug(message, data) {
      entries.push({ level: "debug", message, data });
    },
    warn(message, data) {
      entries.push({ level: "warn", message, data });
    }
  };
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected the call to throw");
}

export function improperDetail(fn: () => unknown): ImproperKeyDetail {
  const e = thrownBy(fn);
  if (!(e instanceof ImproperKeyError)) throw e;
  return e.detail;
}
