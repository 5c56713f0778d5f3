import { CharacterizationError } from "@inexact/core";

export const RANGE_SEPARATOR = ":";

const INTEGER = /^[+-]?\d+$/;
const COMPONENT_LABELS = ["start", "stop", "step"] as const;

export interface IntegerRange {
  readonly start: number;
  readonly stop: number;
  readonly step: number;
}

export type ExpandedToken =
  | { readonly kind: "literal"; readonly value: string }
  | { readonly kind: "range"; readonly token: string; readonly values: readonly number[] };

function parseComponent(part: string, label: (typeof COMPONENT_LABELS)[number], token: string): number {
  const value = INTEGER.test(part) ? Number.parseInt(part, 10) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new CharacterizationError(
      "InvalidRangeComponent",
      `got invalid ${label} part "${part}" in range-type argument ${token}`,
      { token, component: label },
    );
  }
  return value;
}

/** Parses `start:stop` or `start:stop:step` into its bounds. */
export function parseRange(token: string): IntegerRange {
  const parts = token.split(RANGE_SEPARATOR);
  if (parts.length !== 2 && parts.length !== 3) {
    throw new CharacterizationError("InvalidRange", `got invalid range-type argument ${token}`, { token });
  }
  const bounds = parts.map((part, index) => parseComponent(part, COMPONENT_LABELS[index], token));
  const [start, stop] = bounds;
  if (bounds.length === 2) {
    return { start, stop, step: stop < start ? -1 : 1 };
  }
  const step = bounds[2];
  if (step === 0 || (stop < start && step > 0) || (stop > start && step < 0)) {
    throw new CharacterizationError(
      "InvalidRange",
      `got malformed range ${token}: step ${step} does not lead from ${start} to ${stop}`,
      { token },
    );
  }
  return { start, stop, step };
}

/** Enumerates a range, including `stop` whenever a step lands on it. */
export function rangeValues(range: IntegerRange): number[] {
  const values: number[] = [];
  const ascending = range.step > 0;
  for (
    let value = range.start;
    ascending ? value <= range.stop : value >= range.stop;
    value += range.step
  ) {
    values.push(value);
  }
  return values;
}

export function expandRange(token: string): number[] {
  return rangeValues(parseRange(token));
}

export function isRangeToken(token: string): boolean {
  return token.includes(RANGE_SEPARATOR);
}

export function expandToken(token: string): ExpandedToken {
  if (!isRangeToken(token)) {
    return { kind: "literal", value: token };
  }
  return { kind: "range", token, values: expandRange(token) };
}
