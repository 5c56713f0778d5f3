import type {
  CharacterizationResult,
  ErrorModel,
  ExhaustiveResult,
  MedCell,
  Random2DResult,
  Random3DResult,
  SegmentedMedModel,
  SegmentedRegressionModel,
} from "@inexact/core";

import { modelName, varyingParameterIndices } from "./naming.js";
import { fitLine, meanOf, type Observation } from "./regression.js";
import { DOMAIN_BITS, DOMAIN_COUNT, domainOf, domainShift } from "./segments.js";

function exactLookup(result: ExhaustiveResult): ErrorModel {
  return Object.freeze({ kind: "exact-lookup", bitWidth: result.bitWidth, errors: result.errors });
}

function segmentedRegression(result: Random2DResult): SegmentedRegressionModel {
  const shift = domainShift(result.bitWidth);
  const domains: Observation[][] = Array.from({ length: DOMAIN_COUNT }, () => []);
  const keys = Array.from(result.errors.keys()).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const key of keys) {
    const samples = result.errors.get(key) ?? [];
    // A key without samples carries no error to fit.
    if (samples.length === 0) {
      continue;
    }
    domains[domainOf(key, shift)].push({ x: Number(key), y: meanOf(samples) });
  }
  return Object.freeze({
    kind: "segmented-regression",
    bitWidth: result.bitWidth,
    domainBits: DOMAIN_BITS,
    shift,
    segments: Object.freeze(domains.map((observations) => Object.freeze(fitLine(observations)))),
  });
}

function segmentedMed(result: Random3DResult): SegmentedMedModel {
  const shift = domainShift(result.bitWidth);
  const buckets: bigint[][][] = Array.from({ length: DOMAIN_COUNT }, () =>
    Array.from({ length: DOMAIN_COUNT }, () => []),
  );
  for (const { a, b, error } of result.errors.values()) {
    buckets[domainOf(a, shift)][domainOf(b, shift)].push(error);
  }
  const cells: readonly (readonly MedCell[])[] = Object.freeze(
    buckets.map((row) =>
      Object.freeze(row.map((errors) => Object.freeze({ med: meanOf(errors), samples: errors.length }))),
    ),
  );
  return Object.freeze({ kind: "segmented-med", bitWidth: result.bitWidth, domainBits: DOMAIN_BITS, shift, cells });
}

/** Derives the error model matching the shape of one characterization result. */
export function synthesizeModel(result: CharacterizationResult): ErrorModel {
  switch (result.kind) {
    case "exhaustive":
      return exactLookup(result);
    case "random2d":
      return segmentedRegression(result);
    case "random3d":
      return segmentedMed(result);
  }
}

export interface SynthesizedModel {
  /** `<module>` followed by the parameter values that vary across the batch. */
  readonly name: string;
  readonly labels: readonly string[];
  readonly result: CharacterizationResult;
  readonly model: ErrorModel;
}

export function synthesizeModels(results: readonly CharacterizationResult[]): SynthesizedModel[] {
  const indices = varyingParameterIndices(results);
  return results.map((result) => ({
    name: modelName(result, indices),
    labels: indices.map((index) => result.params[index]),
    result,
    model: synthesizeModel(result),
  }));
}
