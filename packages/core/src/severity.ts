export type Severity = "info" | "warning" | "error";

export type SeverityVocabulary = Readonly<Record<Severity, string>>;

export const SEVERITIES: readonly Severity[] = ["info", "warning", "error"];

export const PLAIN_VOCABULARY: SeverityVocabulary = {
  info: "[inexact-info]",
  warning: "[inexact-warning]",
  error: "[inexact-error]",
};

export const COLOR_VOCABULARY: SeverityVocabulary = {
  info: "[inexact-info]",
  warning: "[\u001b[1;33minexact-warning\u001b[0;0m]",
  error: "[\u001b[1;31minexact-error\u001b[0;0m]",
};

export function ansiHighlight(text: string): string {
  return `\u001b[1;33m${text}\u001b[0;0m`;
}

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Rewrites severity labels in `text` into `vocabulary`.
 *
 * `sources` maps each severity to the labels that denote it in the input; the
 * default covers the bracketed `[info]`, `[warning]` and `[error]` prefixes.
 */
export function relabel(
  text: string,
  vocabulary: SeverityVocabulary,
  sources: Readonly<Partial<Record<Severity, readonly string[]>>> = {},
): string {
  let output = text;
  for (const severity of SEVERITIES) {
    const labels = [`[${severity}]`, ...(sources[severity] ?? [])];
    for (const label of labels) {
      output = output.replace(new RegExp(escapeRegExp(label), "g"), vocabulary[severity]);
    }
  }
  return output;
}
