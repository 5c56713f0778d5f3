import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import AjvModule from "ajv";

import { CharacterizationError, type ErrorModel } from "@inexact/core";
import { canonicalJson } from "@inexact/utils";

import { modelArtifactSchema, type ModelArtifact } from "./schemas.js";
import type { SynthesizedModel } from "./synthesize.js";

const Ajv = AjvModule.default;

const ajv = new Ajv({ allErrors: true, strict: false, strictNumbers: true });
const validateArtifact = ajv.compile<ModelArtifact>(modelArtifactSchema);

function modelFields(model: ErrorModel): Pick<ModelArtifact, "kind" | "errors" | "domainBits" | "shift" | "segments" | "cells"> {
  switch (model.kind) {
    case "exact-lookup":
      return { kind: model.kind, errors: model.errors.map((row) => Array.from(row, (value) => value.toString())) };
    case "segmented-regression":
      return {
        kind: model.kind,
        domainBits: model.domainBits,
        shift: model.shift,
        segments: model.segments.map(({ slope, intercept, samples }) => ({ slope, intercept, samples })),
      };
    case "segmented-med":
      return {
        kind: model.kind,
        domainBits: model.domainBits,
        shift: model.shift,
        cells: model.cells.map((row) => row.map(({ med, samples }) => ({ med, samples }))),
      };
  }
}

export function assertModelArtifact(value: unknown): asserts value is ModelArtifact {
  if (!validateArtifact(value)) {
    throw new CharacterizationError("InvalidArtifact", `model artifact is invalid: ${ajv.errorsText(validateArtifact.errors)}`);
  }
}

export function toModelArtifact(synthesized: SynthesizedModel): ModelArtifact {
  const { result, model, name } = synthesized;
  const artifact: ModelArtifact = {
    name,
    test: result.name,
    module: result.module,
    signed: result.signed,
    bitWidth: result.bitWidth,
    params: [...result.params],
    ...modelFields(model),
  };
  assertModelArtifact(artifact);
  return artifact;
}

export function parseModelArtifact(text: string): ModelArtifact {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CharacterizationError("InvalidArtifact", `model artifact is not JSON: ${reason}`);
  }
  assertModelArtifact(value);
  return value;
}

/** Writes `<root>/<test>/<model name>.json` per model and resolves with the paths. */
export async function writeModelArtifacts(models: readonly SynthesizedModel[], root: string): Promise<string[]> {
  const written: string[] = [];
  for (const synthesized of models) {
    const artifact = toModelArtifact(synthesized);
    const directory = path.join(root, artifact.test);
    await mkdir(directory, { recursive: true });
    const filePath = path.join(directory, `${artifact.name}.json`);
    await writeFile(filePath, canonicalJson(artifact), "utf8");
    written.push(filePath);
  }
  return written;
}
