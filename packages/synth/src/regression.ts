import type { RegressionSegment } from "@inexact/core";

export interface Observation {
  readonly x: number;
  readonly y: number;
}

/**
 * Ordinary least squares over the observations, centered on their means.
 * No observations fit to a zero line; a single distinct `x` fits a flat line
 * through the mean of `y`.
 */
export function fitLine(observations: readonly Observation[]): RegressionSegment {
  const samples = observations.length;
  if (samples === 0) {
    return { slope: 0, intercept: 0, samples };
  }
  const meanX = observations.reduce((total, { x }) => total + x, 0) / samples;
  const meanY = observations.reduce((total, { y }) => total + y, 0) / samples;

  let sxx = 0;
  let sxy = 0;
  for (const { x, y } of observations) {
    sxx += (x - meanX) * (x - meanX);
    sxy += (x - meanX) * (y - meanY);
  }
  if (sxx === 0) {
    return { slope: 0, intercept: meanY, samples };
  }
  const slope = sxy / sxx;
  return { slope, intercept: meanY - slope * meanX, samples };
}

export function meanOf(values: readonly bigint[]): number {
  if (values.length === 0) {
    return 0;
  }
  const sum = values.reduce((total, value) => total + value, 0n);
  return Number(sum) / values.length;
}
