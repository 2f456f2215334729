export class KeyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KeyError";
  }
}

export type ImproperKeyDetail =
  | { kind: "badFormatData" }
  | { kind: "initializationVectorSize"; expected: number; actual: number }
  | { kind: "saltSize"; expected: number; actual: number }
  | { kind: "seedSize"; expected: number; actual: number };

export type ImproperKeyKind = ImproperKeyDetail["kind"];

const SIZE_LABELS: Record<Exclude<ImproperKeyKind, "badFormatData">, string> = {
  initializationVectorSize: "Initialization vector",
  saltSize: "Salt",
  seedSize: "Seed"
};

function describeDetail(detail: ImproperKeyDetail): string {
  if (detail.kind === "badFormatData") {
    return "Data does not start with a known key format version";
  }
  return `${SIZE_LABELS[detail.kind]} must be ${detail.expected} bytes (got ${detail.actual})`;
}

/**
 * Raised when key material or a serialized key does not fit its scheme.
 */
export class ImproperKeyError extends KeyError {
  readonly detail: ImproperKeyDetail;

  constructor(detail: ImproperKeyDetail) {
    super(describeDetail(detail));
    this.name = "ImproperKeyError";
    this.detail = detail;
  }

  get kind(): ImproperKeyKind {
    return this.detail.kind;
  }

  get expected(): number | undefined {
    return this.detail.kind === "badFormatData" ? undefined : this.detail.expected;
  }

  get actual(): number | undefined {
    return this.detail.kind === "badFormatData" ? undefined : this.detail.actual;
  }
}

export class ValidationError extends KeyError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class SchemeError extends KeyError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemeError";
  }
}

export class WipedKeyError extends KeyError {
  constructor(message = "Key material was wiped") {
    super(message);
    this.name = "WipedKeyError";
  }
}
