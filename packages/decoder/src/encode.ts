import type { ErrorGrid, PairedError } from "@inexact/core";

import { COUNT_BYTES, ENTRY_BYTES, HEADER_BYTES, RANDOM3D_RECORD_BYTES } from "./decode.js";

// Writers mirror the harness's output so fixtures can be produced in-process.

function writeHeader(view: DataView, aWidth: number, bWidth: number): void {
  view.setInt32(0, aWidth, false);
  view.setInt32(4, bWidth, false);
}

export function encodeExhaustive(grid: ErrorGrid, aWidth: number, bWidth: number = aWidth): Uint8Array {
  const entries = grid.reduce((total, row) => total + row.length, 0);
  const bytes = new Uint8Array(HEADER_BYTES + entries * ENTRY_BYTES);
  const view = new DataView(bytes.buffer);
  writeHeader(view, aWidth, bWidth);
  let offset = HEADER_BYTES;
  for (const row of grid) {
    for (const value of row) {
      view.setBigInt64(offset, value, false);
      offset += ENTRY_BYTES;
    }
  }
  return bytes;
}

export function encodeRandom2D(
  samples: Iterable<readonly [bigint, readonly bigint[]]>,
  aWidth: number,
  bWidth: number = aWidth,
): Uint8Array {
  const records = Array.from(samples);
  const size = records.reduce(
    (total, [, values]) => total + ENTRY_BYTES + COUNT_BYTES + values.length * ENTRY_BYTES,
    HEADER_BYTES,
  );
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);
  writeHeader(view, aWidth, bWidth);
  let offset = HEADER_BYTES;
  for (const [key, values] of records) {
    view.setBigInt64(offset, key, false);
    view.setInt32(offset + ENTRY_BYTES, values.length, false);
    offset += ENTRY_BYTES + COUNT_BYTES;
    for (const value of values) {
      view.setBigInt64(offset, value, false);
      offset += ENTRY_BYTES;
    }
  }
  return bytes;
}

export function encodeRandom3D(records: Iterable<PairedError>, aWidth: number, bWidth: number = aWidth): Uint8Array {
  const list = Array.from(records);
  const bytes = new Uint8Array(HEADER_BYTES + list.length * RANDOM3D_RECORD_BYTES);
  const view = new DataView(bytes.buffer);
  writeHeader(view, aWidth, bWidth);
  list.forEach(({ a, b, error }, index) => {
    const offset = HEADER_BYTES + index * RANDOM3D_RECORD_BYTES;
    view.setBigInt64(offset, a, false);
    view.setBigInt64(offset + ENTRY_BYTES, b, false);
    view.setBigInt64(offset + 2 * ENTRY_BYTES, error, false);
  });
  return bytes;
}
