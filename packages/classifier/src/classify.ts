import {
  CharacterizationError,
  PLAIN_VOCABULARY,
  isCharacterizationKind,
  isModuleKind,
  relabel,
  stripAnsi,
  type HarnessErrorCode,
  type RunMetadata,
  type SeverityVocabulary,
} from "@inexact/core";

import { DEFAULT_DIALECT, isHarnessLine, relabelSources, type HarnessDialect } from "./dialect.js";

export interface ClassifyOptions {
  readonly dialect?: HarnessDialect;
  readonly vocabulary?: SeverityVocabulary;
}

export interface HarnessFailureDetail {
  readonly code: HarnessErrorCode;
  readonly explain: string;
  readonly diagnostic?: string;
}

export interface HarnessSuccess {
  readonly ok: true;
  readonly metadata: RunMetadata;
  /** Relabeled info and warning lines emitted by the harness. */
  readonly messages: readonly string[];
}

export interface HarnessFailure {
  readonly ok: false;
  readonly error: HarnessFailureDetail;
}

export type HarnessVerdict = HarnessSuccess | HarnessFailure;

const failure = (code: HarnessErrorCode, explain: string, diagnostic?: string): HarnessFailure => ({
  ok: false,
  error: diagnostic === undefined ? { code, explain } : { code, explain, diagnostic },
});

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function compileDiagnostic(lines: readonly string[], dialect: HarnessDialect): string {
  const block = lines.filter((line) => line.includes(dialect.buildErrorMarker));
  const caret = block.findIndex((line) => line.includes(dialect.caretMarker));
  return (caret === -1 ? block : block.slice(0, caret + 1)).join("\n");
}

function notExecutedDiagnostic(lines: readonly string[], testName: string, dialect: HarnessDialect): string {
  const start = Math.max(
    0,
    lines.findIndex((line) => line.includes(testName)),
  );
  return lines.slice(start, start + dialect.notExecutedWindow).join("\n");
}

function runtimeDiagnostic(lines: readonly string[], dialect: HarnessDialect): string {
  const harnessLines = lines.filter((line) => isHarnessLine(line, dialect));
  const start = harnessLines.findIndex((line) => line.includes(dialect.labels.error));
  return harnessLines.slice(Math.max(0, start)).join("\n");
}

function parseMetadata(lines: readonly string[], dialect: HarnessDialect): RunMetadata | HarnessFailure {
  const label = dialect.labels.info;
  const line = lines.find((candidate) => candidate.includes(label));
  if (line === undefined) {
    return failure("MalformedMetadata", "harness output carries no characterization info line");
  }
  const fields = line
    .slice(line.indexOf(label) + label.length)
    .trim()
    .split(/\s+/)
    .map((field) => field.toLowerCase());
  const [kind = "", signedness = "", module = ""] = fields;
  if (!isCharacterizationKind(kind)) {
    return failure("MalformedMetadata", `unknown characterization kind "${kind}"`, line);
  }
  if (signedness !== "signed" && signedness !== "unsigned") {
    return failure("MalformedMetadata", `unknown signedness "${signedness}"`, line);
  }
  if (!isModuleKind(module)) {
    return failure(
      "UnsupportedModule",
      `cannot produce models for module of type ${module || "<none>"}, only adders and multipliers are supported`,
      line,
    );
  }
  return { kind, signed: signedness === "signed", module };
}

/**
 * Decides how one harness invocation went. Checks run in a fixed order:
 * missing test, nothing executed, harness-reported error, build error, and
 * finally the metadata of a successful run.
 */
export function classifyOutput(output: string, testName: string, options: ClassifyOptions = {}): HarnessVerdict {
  const dialect = options.dialect ?? DEFAULT_DIALECT;
  const vocabulary = options.vocabulary ?? PLAIN_VOCABULARY;
  const sources = relabelSources(dialect);
  const text = stripAnsi(output);
  const lines = splitLines(text);

  if (text.includes(dialect.noTestsMarker)) {
    return failure("NotFound", `the specified test ${testName} does not exist`);
  }
  if (text.includes(dialect.notExecutedMarker)) {
    return failure(
      "DidNotExecute",
      `the specified test ${testName} could not be executed`,
      relabel(notExecutedDiagnostic(lines, testName, dialect), vocabulary, sources),
    );
  }
  if (text.includes(dialect.labels.error)) {
    return failure(
      "RuntimeError",
      `characterizer ${testName} reports errors`,
      relabel(runtimeDiagnostic(lines, dialect), vocabulary, sources),
    );
  }
  if (text.includes(dialect.buildErrorMarker)) {
    return failure(
      "CompileError",
      `the specified test ${testName} does not compile`,
      relabel(compileDiagnostic(lines, dialect), vocabulary, sources),
    );
  }

  const metadata = parseMetadata(lines, dialect);
  if ("ok" in metadata) {
    return metadata.error.diagnostic === undefined
      ? metadata
      : failure(metadata.error.code, metadata.error.explain, relabel(metadata.error.diagnostic, vocabulary, sources));
  }
  const messages = lines
    .filter((line) => line.includes(dialect.labels.info) || line.includes(dialect.labels.warning))
    .map((line) => relabel(line, vocabulary, sources));
  return { ok: true, metadata, messages };
}

export function verdictError(verdict: HarnessFailure, testName: string): CharacterizationError {
  const { code, explain, diagnostic } = verdict.error;
  return new CharacterizationError(code, explain, diagnostic === undefined ? { testName } : { testName, diagnostic });
}
