import { expandToken, type ExpandedToken } from "./range.js";
import type { BoundArgument } from "./bind.js";

export interface SweepParameter {
  readonly name: string;
  readonly token: ExpandedToken;
}

/** One concrete assignment of values to the declared parameters. */
export interface SweepPoint {
  readonly names: readonly string[];
  readonly values: readonly string[];
  /** Positions whose value comes from a range argument. */
  readonly varying: readonly number[];
}

export function toSweepParameters(bound: readonly BoundArgument[]): SweepParameter[] {
  return bound.map((argument) => ({ name: argument.name, token: expandToken(argument.value) }));
}

/**
 * Cartesian product over the range parameters with literals held fixed.
 * Parameters are visited in declared order, so the last range varies fastest.
 */
export function sweepPoints(parameters: readonly SweepParameter[]): SweepPoint[] {
  const names = parameters.map((parameter) => parameter.name);
  const varying = parameters.flatMap((parameter, index) => (parameter.token.kind === "range" ? [index] : []));

  let partials: string[][] = [[]];
  for (const parameter of parameters) {
    const choices =
      parameter.token.kind === "range" ? parameter.token.values.map((value) => String(value)) : [parameter.token.value];
    const next: string[][] = [];
    for (const partial of partials) {
      for (const choice of choices) {
        next.push([...partial, choice]);
      }
    }
    partials = next;
  }

  return partials.map((values) => ({ names, values, varying }));
}
