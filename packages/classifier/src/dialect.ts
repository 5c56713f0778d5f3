import type { Severity } from "@inexact/core";

/** Textual conventions of the harness and the build tool that hosts it. */
export interface HarnessDialect {
  readonly labels: Readonly<Record<Severity, string>>;
  readonly noTestsMarker: string;
  readonly notExecutedMarker: string;
  readonly buildErrorMarker: string;
  readonly caretMarker: string;
  readonly notExecutedWindow: number;
}

export const DEFAULT_DIALECT: HarnessDialect = {
  labels: {
    info: "[harness-info]",
    warning: "[harness-warning]",
    error: "[harness-error]",
  },
  noTestsMarker: "No tests to run",
  notExecutedMarker: "No tests were executed",
  buildErrorMarker: "[error]",
  caretMarker: "^",
  notExecutedWindow: 4,
};

export function isHarnessLine(line: string, dialect: HarnessDialect): boolean {
  return Object.values(dialect.labels).some((label) => line.includes(label));
}

export function relabelSources(dialect: HarnessDialect): Record<Severity, readonly string[]> {
  return {
    info: [dialect.labels.info],
    warning: [dialect.labels.warning],
    error: [dialect.labels.error],
  };
}
