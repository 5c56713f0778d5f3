export type CharacterizationKind = "exhaustive" | "random2d" | "random3d";

export type ModuleKind = "adder" | "multiplier";

const CHARACTERIZATION_KINDS: readonly CharacterizationKind[] = ["exhaustive", "random2d", "random3d"];

const MODULE_KINDS: readonly ModuleKind[] = ["adder", "multiplier"];

/** Declared properties of a characterized unit, as reported by the harness. */
export interface ResultMeta {
  readonly name: string;
  readonly signed: boolean;
  readonly module: ModuleKind;
  readonly params: readonly string[];
}

interface ResultBase extends ResultMeta {
  readonly bitWidth: number;
}

/** Row-major `2^w × 2^w` error grid, row = operand A. */
export type ErrorGrid = readonly BigInt64Array[];

export type OperandPairKey = `${bigint}:${bigint}`;

export interface PairedError {
  readonly a: bigint;
  readonly b: bigint;
  readonly error: bigint;
}

export interface ExhaustiveResult extends ResultBase {
  readonly kind: "exhaustive";
  readonly errors: ErrorGrid;
}

export interface Random2DResult extends ResultBase {
  readonly kind: "random2d";
  readonly errors: ReadonlyMap<bigint, readonly bigint[]>;
}

export interface Random3DResult extends ResultBase {
  readonly kind: "random3d";
  readonly errors: ReadonlyMap<OperandPairKey, PairedError>;
}

export type CharacterizationResult = ExhaustiveResult | Random2DResult | Random3DResult;

export interface RegressionSegment {
  readonly slope: number;
  readonly intercept: number;
  readonly samples: number;
}

export interface MedCell {
  readonly med: number;
  readonly samples: number;
}

export interface ExactLookupModel {
  readonly kind: "exact-lookup";
  readonly bitWidth: number;
  readonly errors: ErrorGrid;
}

export interface SegmentedRegressionModel {
  readonly kind: "segmented-regression";
  readonly bitWidth: number;
  readonly domainBits: number;
  readonly shift: number;
  readonly segments: readonly RegressionSegment[];
}

export interface SegmentedMedModel {
  readonly kind: "segmented-med";
  readonly bitWidth: number;
  readonly domainBits: number;
  readonly shift: number;
  readonly cells: readonly (readonly MedCell[])[];
}

export type ErrorModel = ExactLookupModel | SegmentedRegressionModel | SegmentedMedModel;

/** A declared harness parameter, optionally carrying a default value. */
export interface DeclaredParameter {
  readonly name: string;
  readonly defaultValue?: string;
}

/** Metadata parsed from the first info line of a successful run. */
export interface RunMetadata {
  readonly kind: CharacterizationKind;
  readonly signed: boolean;
  readonly module: ModuleKind;
}

export function pairKey(a: bigint, b: bigint): OperandPairKey {
  return `${a}:${b}`;
}

export function isCharacterizationKind(value: string): value is CharacterizationKind {
  return CHARACTERIZATION_KINDS.some((kind) => kind === value);
}

export function isModuleKind(value: string): value is ModuleKind {
  return MODULE_KINDS.some((kind) => kind === value);
}
