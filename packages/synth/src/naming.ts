import type { ResultMeta } from "@inexact/core";

/** Positions of `params` that take more than one value across the batch. */
export function varyingParameterIndices(results: readonly Pick<ResultMeta, "params">[]): number[] {
  if (results.length === 0) {
    return [];
  }
  const indices: number[] = [];
  results[0].params.forEach((_, index) => {
    const values = new Set(results.map((result) => result.params[index]));
    if (values.size > 1) {
      indices.push(index);
    }
  });
  return indices;
}

export function modelName(result: Pick<ResultMeta, "module" | "params">, indices: readonly number[]): string {
  return [result.module, ...indices.map((index) => result.params[index])].join("_");
}
