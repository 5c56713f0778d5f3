import type { ErrorModel, ResultMeta } from "@inexact/core";

import { domainOf } from "./segments.js";

export type UnitShape = Pick<ResultMeta, "module" | "signed">;

export interface OperandRange {
  readonly min: bigint;
  readonly max: bigint;
}

export function operandRange(bitWidth: number, signed: boolean): OperandRange {
  const width = BigInt(bitWidth);
  return signed
    ? { min: -(1n << (width - 1n)), max: (1n << (width - 1n)) - 1n }
    : { min: 0n, max: (1n << width) - 1n };
}

/**
 * Evaluates the approximate operator described by a model: the exact result
 * is truncated to the unit's width, the modeled error is added, and the sum
 * is truncated again (and sign-extended for signed units).
 */
export function applyModel(model: ErrorModel, unit: UnitShape, a: bigint, b: bigint): bigint {
  const { min, max } = operandRange(model.bitWidth, unit.signed);
  for (const operand of [a, b]) {
    if (operand < min || operand > max) {
      throw new RangeError(`operand ${operand} is outside [${min}, ${max}]`);
    }
  }

  const width = BigInt(model.bitWidth);
  const mask = (1n << width) - 1n;
  const exact = (unit.module === "adder" ? a + b : a * b) & mask;

  let sum: bigint;
  switch (model.kind) {
    case "exact-lookup":
      sum = exact + model.errors[Number(a & mask)][Number(b & mask)];
      break;
    case "segmented-regression": {
      const { slope, intercept } = model.segments[domainOf(exact, model.shift)];
      sum = exact + BigInt(Math.trunc(slope * Number(exact) + intercept));
      break;
    }
    case "segmented-med": {
      const { med } = model.cells[domainOf(a, model.shift)][domainOf(b, model.shift)];
      sum = BigInt(Math.trunc(Number(exact) + med));
      break;
    }
  }

  const truncated = sum & mask;
  return unit.signed ? BigInt.asIntN(model.bitWidth, truncated) : truncated;
}
