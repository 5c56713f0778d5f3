export class CanonicalizeError extends Error {
  readonly code = "E_CANONICALIZE" as const;

  constructor(message: string) {
    super(message);
    this.name = "CanonicalizeError";
  }
}

/**
 * Normalizes a value into plain JSON data with sorted object keys.
 *
 * Bigints (and the elements of bigint typed arrays) become decimal strings so
 * 64-bit values survive serialization; maps become sorted `[key, value]` pairs.
 */
export function canonicalize(value: unknown): unknown {
  if (value === null) {
    return null;
  }
  if (value === undefined) {
    throw new CanonicalizeError("cannot canonicalize undefined");
  }
  if (typeof value === "number") {
    return canonicalizeNumber(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "symbol" || typeof value === "function") {
    throw new CanonicalizeError(`cannot canonicalize ${typeof value}`);
  }
  if (Array.isArray(value)) {
    return value.map((entry) => canonicalize(entry));
  }
  if (value instanceof BigInt64Array || value instanceof BigUint64Array) {
    return Array.from(value, (entry) => entry.toString());
  }
  if (ArrayBuffer.isView(value)) {
    return Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
  }
  if (value instanceof Map) {
    return canonicalizeMap(value);
  }
  if (value instanceof Set) {
    return sortByLabel(Array.from(value.values(), (entry) => canonicalize(entry)));
  }
  if (isPlainObject(value)) {
    return canonicalizeObject(value);
  }
  throw new CanonicalizeError(`cannot canonicalize value of type ${typeof value}`);
}

export function canonicalJson(value: unknown): string {
  return `${JSON.stringify(canonicalize(value))}\n`;
}

function canonicalizeNumber(value: number): number {
  if (!Number.isFinite(value)) {
    throw new CanonicalizeError(`cannot canonicalize non-finite number ${value}`);
  }
  return Object.is(value, -0) ? 0 : value;
}

function canonicalizeMap(map: Map<unknown, unknown>): unknown[] {
  const entries = Array.from(map.entries(), ([key, entry]) => [canonicalize(key), canonicalize(entry)]);
  return sortByLabel(entries);
}

function canonicalizeObject(value: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort(compareLabels)) {
    const entry = value[key];
    if (entry === undefined) {
      continue;
    }
    result[key] = canonicalize(entry);
  }
  return result;
}

function sortByLabel(values: unknown[]): unknown[] {
  return values
    .map((entry) => ({ label: JSON.stringify(entry), entry }))
    .sort((a, b) => compareLabels(a.label, b.label))
    .map(({ entry }) => entry);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function compareLabels(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return 0;
}
