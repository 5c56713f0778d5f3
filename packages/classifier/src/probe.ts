import { stripAnsi, type DeclaredParameter } from "@inexact/core";

import { DEFAULT_DIALECT, type HarnessDialect } from "./dialect.js";

// "<label> - <name> : <type> [(got <value>) | (defaults to <value>) | (missing)]"
const PARAMETER_LINE = /^\s*\S+\s+-\s+(\S+)\s+:\s*(.*)$/;
const DEFAULT_SUFFIX = /\((?:got|defaults to) (.*)\)\s*$/;

/**
 * Extracts declared parameters from the diagnostics of a parameterless
 * harness run, in declaration order.
 */
export function parseDeclaredParameters(
  output: string,
  dialect: HarnessDialect = DEFAULT_DIALECT,
): DeclaredParameter[] {
  const declared: DeclaredParameter[] = [];
  const seen = new Set<string>();
  for (const line of stripAnsi(output).split(/\r?\n/)) {
    const label = Object.values(dialect.labels).find((candidate) => line.includes(candidate));
    if (label === undefined) {
      continue;
    }
    const match = PARAMETER_LINE.exec(line.slice(line.indexOf(label)));
    if (!match) {
      continue;
    }
    const [, name, rest] = match;
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);
    const fallback = DEFAULT_SUFFIX.exec(rest);
    declared.push(fallback ? { name, defaultValue: fallback[1] } : { name });
  }
  return declared;
}
