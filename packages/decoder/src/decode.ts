import { readFile } from "node:fs/promises";

import {
  CharacterizationError,
  pairKey,
  type CharacterizationKind,
  type CharacterizationResult,
  type ErrorGrid,
  type OperandPairKey,
  type PairedError,
  type ResultMeta,
} from "@inexact/core";

export const HEADER_BYTES = 8;
export const ENTRY_BYTES = 8;
export const COUNT_BYTES = 4;
export const RANDOM3D_RECORD_BYTES = 3 * ENTRY_BYTES;

export interface Decoded<T> {
  readonly bitWidth: number;
  readonly errors: T;
}

function viewOf(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Reads the two operand widths and returns the shared width. */
export function readHeader(view: DataView): number {
  if (view.byteLength < HEADER_BYTES) {
    throw new CharacterizationError(
      "SizeMismatch",
      `result file holds ${view.byteLength} bytes, shorter than the ${HEADER_BYTES}-byte header`,
    );
  }
  const aWidth = view.getInt32(0, false);
  const bWidth = view.getInt32(4, false);
  if (aWidth !== bWidth) {
    throw new CharacterizationError(
      "MalformedHeader",
      `operands must have the same bit width, got ${aWidth} and ${bWidth}`,
    );
  }
  if (aWidth <= 0) {
    throw new CharacterizationError("MalformedHeader", `operand bit width must be positive, got ${aWidth}`);
  }
  return aWidth;
}

export function decodeExhaustive(bytes: Uint8Array): Decoded<ErrorGrid> {
  const view = viewOf(bytes);
  const width = readHeader(view);
  const body = view.byteLength - HEADER_BYTES;
  const side = 2 ** width;
  const expected = side * side;
  if (body % ENTRY_BYTES !== 0 || body / ENTRY_BYTES !== expected) {
    throw new CharacterizationError(
      "SizeMismatch",
      `exhaustive payload of ${body} bytes does not hold ${expected} entries for ${width}-bit operands`,
    );
  }
  const rows: BigInt64Array[] = [];
  let offset = HEADER_BYTES;
  for (let a = 0; a < side; a += 1) {
    const row = new BigInt64Array(side);
    for (let b = 0; b < side; b += 1) {
      row[b] = view.getBigInt64(offset, false);
      offset += ENTRY_BYTES;
    }
    rows.push(row);
  }
  return { bitWidth: width, errors: rows };
}

export function decodeRandom2D(bytes: Uint8Array): Decoded<Map<bigint, readonly bigint[]>> {
  const view = viewOf(bytes);
  const width = readHeader(view);
  const errors = new Map<bigint, readonly bigint[]>();
  let offset = HEADER_BYTES;
  while (offset < view.byteLength) {
    if (offset + ENTRY_BYTES + COUNT_BYTES > view.byteLength) {
      throw new CharacterizationError("SizeMismatch", `truncated random 2D record at byte ${offset}`);
    }
    const key = view.getBigInt64(offset, false);
    const count = view.getInt32(offset + ENTRY_BYTES, false);
    offset += ENTRY_BYTES + COUNT_BYTES;
    if (count < 0 || offset + count * ENTRY_BYTES > view.byteLength) {
      throw new CharacterizationError(
        "SizeMismatch",
        `random 2D record for result ${key} declares ${count} samples beyond the end of the payload`,
      );
    }
    const samples: bigint[] = [];
    for (let index = 0; index < count; index += 1) {
      samples.push(view.getBigInt64(offset, false));
      offset += ENTRY_BYTES;
    }
    errors.set(key, samples);
  }
  return { bitWidth: width, errors };
}

export function decodeRandom3D(bytes: Uint8Array): Decoded<Map<OperandPairKey, PairedError>> {
  const view = viewOf(bytes);
  const width = readHeader(view);
  const body = view.byteLength - HEADER_BYTES;
  if (body % RANDOM3D_RECORD_BYTES !== 0) {
    throw new CharacterizationError(
      "SizeMismatch",
      `random 3D payload of ${body} bytes is not a whole number of ${RANDOM3D_RECORD_BYTES}-byte records`,
    );
  }
  const errors = new Map<OperandPairKey, PairedError>();
  for (let offset = HEADER_BYTES; offset < view.byteLength; offset += RANDOM3D_RECORD_BYTES) {
    const a = view.getBigInt64(offset, false);
    const b = view.getBigInt64(offset + ENTRY_BYTES, false);
    const error = view.getBigInt64(offset + 2 * ENTRY_BYTES, false);
    errors.set(pairKey(a, b), { a, b, error });
  }
  return { bitWidth: width, errors };
}

export function decodeResult(bytes: Uint8Array, kind: CharacterizationKind, meta: ResultMeta): CharacterizationResult {
  const base = { name: meta.name, signed: meta.signed, module: meta.module, params: Object.freeze([...meta.params]) };
  switch (kind) {
    case "exhaustive": {
      const { bitWidth, errors } = decodeExhaustive(bytes);
      return Object.freeze({ ...base, kind, bitWidth, errors });
    }
    case "random2d": {
      const { bitWidth, errors } = decodeRandom2D(bytes);
      return Object.freeze({ ...base, kind, bitWidth, errors });
    }
    case "random3d": {
      const { bitWidth, errors } = decodeRandom3D(bytes);
      return Object.freeze({ ...base, kind, bitWidth, errors });
    }
  }
}

export async function readResultFile(
  filePath: string,
  kind: CharacterizationKind,
  meta: ResultMeta,
): Promise<CharacterizationResult> {
  const bytes = await readFile(filePath);
  return decodeResult(bytes, kind, meta);
}
