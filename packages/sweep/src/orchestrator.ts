import {
  silentReporter,
  type CharacterizationKind,
  type CharacterizationResult,
  type DeclaredParameter,
  type Reporter,
  type ResultMeta,
} from "@inexact/core";
import {
  DEFAULT_DIALECT,
  classifyOutput,
  parseDeclaredParameters,
  verdictError,
  type ClassifyOptions,
} from "@inexact/classifier";
import { readResultFile } from "@inexact/decoder";

import { bindArguments, type ArgumentBinding } from "./bind.js";
import type { HarnessConfig } from "./config.js";
import { sweepPoints, toSweepParameters, type SweepPoint } from "./product.js";
import { resultFilePath, type HarnessFlag, type HarnessRunner } from "./runner.js";

export interface SweepRequest {
  readonly testName: string;
  /** Literal, range (`start:stop[:step]`) or `name=value` tokens. */
  readonly args: readonly string[];
  readonly verbose?: boolean;
}

export type ResultReader = (
  filePath: string,
  kind: CharacterizationKind,
  meta: ResultMeta,
) => Promise<CharacterizationResult>;

export interface SweepDependencies {
  readonly runner: HarnessRunner;
  readonly config: HarnessConfig;
  readonly reporter?: Reporter;
  readonly classify?: ClassifyOptions;
  readonly readResult?: ResultReader;
  /** Marks varying values in progress lines after the first point. */
  readonly highlight?: (value: string) => string;
}

export interface SweepPlan {
  readonly declared: readonly DeclaredParameter[];
  readonly binding: ArgumentBinding;
  readonly points: readonly SweepPoint[];
}

/** Asks the harness for its declared parameters by running it without any. */
export async function probeParameters(
  testName: string,
  deps: Pick<SweepDependencies, "runner" | "classify">,
): Promise<DeclaredParameter[]> {
  const output = await deps.runner.run(testName, []);
  const verdict = classifyOutput(output, testName, deps.classify);
  if (!verdict.ok && verdict.error.code === "NotFound") {
    throw verdictError(verdict, testName);
  }
  const declared = parseDeclaredParameters(output, deps.classify?.dialect ?? DEFAULT_DIALECT);
  if (declared.length === 0 && !verdict.ok && verdict.error.code === "CompileError") {
    throw verdictError(verdict, testName);
  }
  return declared;
}

export async function planSweep(request: SweepRequest, deps: SweepDependencies): Promise<SweepPlan> {
  const reporter = deps.reporter ?? silentReporter;
  const declared = await probeParameters(request.testName, deps);
  const binding = bindArguments(declared, request.args);
  if (binding.ignored.length > 0) {
    reporter.warning(`Ignoring extra arguments ${binding.ignored.join(" ")} to ${request.testName}`);
  }
  const points = sweepPoints(toSweepParameters(binding.bound));
  return { declared, binding, points };
}

const plainValue = (value: string): string => value;

function describePoint(point: SweepPoint, highlight: (value: string) => string): string {
  if (point.names.length === 0) {
    return "no parameters";
  }
  const assignments = point.names.map((name, index) => {
    const value = point.values[index];
    return `${name}=${point.varying.includes(index) ? highlight(value) : value}`;
  });
  return `parameters ${assignments.join(" ")}`;
}

/**
 * Runs the harness once per sweep point and decodes every result. The first
 * failing point rejects the whole batch.
 */
export async function runSweep(
  request: SweepRequest,
  deps: SweepDependencies,
): Promise<readonly CharacterizationResult[]> {
  const reporter = deps.reporter ?? silentReporter;
  const readResult = deps.readResult ?? readResultFile;
  const { testName } = request;
  const plan = await planSweep(request, deps);

  const results: CharacterizationResult[] = [];
  for (const [position, point] of plan.points.entries()) {
    const highlight = position === 0 ? plainValue : deps.highlight ?? plainValue;
    reporter.info(`Running characterizer ${testName} with ${describePoint(point, highlight)}`);
    const flags: HarnessFlag[] = point.names.map((name, index) => ({ name, value: point.values[index] }));
    const output = await deps.runner.run(testName, flags);

    reporter.info(`Analyzing output from characterizer ${testName}`);
    const verdict = classifyOutput(output, testName, deps.classify);
    if (!verdict.ok) {
      throw verdictError(verdict, testName);
    }
    if (request.verbose) {
      verdict.messages.forEach((message) => reporter.raw(message));
    }

    const { kind, signed, module } = verdict.metadata;
    reporter.info(`Found results of ${kind} characterization`);
    const result = await readResult(resultFilePath(deps.config, testName), kind, {
      name: testName,
      signed,
      module,
      params: point.values,
    });
    results.push(result);
  }
  return results;
}
