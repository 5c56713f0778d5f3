import type { JSONSchemaType } from "ajv";

import type { ModuleKind } from "@inexact/core";

export type ModelKind = "exact-lookup" | "segmented-regression" | "segmented-med";

export interface SegmentArtifact {
  slope: number;
  intercept: number;
  samples: number;
}

export interface CellArtifact {
  med: number;
  samples: number;
}

/** JSON hand-off form of one synthesized model. 64-bit errors travel as decimal strings. */
export interface ModelArtifact {
  name: string;
  test: string;
  module: ModuleKind;
  signed: boolean;
  bitWidth: number;
  params: string[];
  kind: ModelKind;
  errors?: string[][];
  domainBits?: number;
  shift?: number;
  segments?: SegmentArtifact[];
  cells?: CellArtifact[][];
}

// One path segment: no separators, and not "." or "..".
const FILE_NAME_PATTERN = "^(?!\\.{1,2}$)[^/\\\\]+$";

const segmentSchema: JSONSchemaType<SegmentArtifact> = {
  type: "object",
  additionalProperties: false,
  required: ["slope", "intercept", "samples"],
  properties: {
    slope: { type: "number" },
    intercept: { type: "number" },
    samples: { type: "integer", minimum: 0 },
  },
};

const cellSchema: JSONSchemaType<CellArtifact> = {
  type: "object",
  additionalProperties: false,
  required: ["med", "samples"],
  properties: {
    med: { type: "number" },
    samples: { type: "integer", minimum: 0 },
  },
};

export const modelArtifactSchema: JSONSchemaType<ModelArtifact> = {
  $id: "https://inexact.dev/schema/model-artifact.json",
  type: "object",
  additionalProperties: false,
  required: ["name", "test", "module", "signed", "bitWidth", "params", "kind"],
  properties: {
    name: { type: "string", minLength: 1, pattern: FILE_NAME_PATTERN },
    test: { type: "string", minLength: 1, pattern: FILE_NAME_PATTERN },
    module: { type: "string", enum: ["adder", "multiplier"] },
    signed: { type: "boolean" },
    bitWidth: { type: "integer", minimum: 1 },
    params: { type: "array", items: { type: "string" } },
    kind: { type: "string", enum: ["exact-lookup", "segmented-regression", "segmented-med"] },
    errors: {
      type: "array",
      nullable: true,
      items: { type: "array", items: { type: "string", pattern: "^-?\\d+$" } },
    },
    domainBits: { type: "integer", minimum: 0, nullable: true },
    shift: { type: "integer", minimum: 0, nullable: true },
    segments: { type: "array", nullable: true, items: segmentSchema },
    cells: { type: "array", nullable: true, items: { type: "array", items: cellSchema } },
  },
  allOf: [
    {
      if: { type: "object", properties: { kind: { type: "string", const: "exact-lookup" } } },
      then: { type: "object", required: ["errors"] },
    },
    {
      if: { type: "object", properties: { kind: { type: "string", const: "segmented-regression" } } },
      then: { type: "object", required: ["domainBits", "shift", "segments"] },
    },
    {
      if: { type: "object", properties: { kind: { type: "string", const: "segmented-med" } } },
      then: { type: "object", required: ["domainBits", "shift", "cells"] },
    },
  ],
};
