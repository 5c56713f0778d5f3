import { PLAIN_VOCABULARY, type Severity, type SeverityVocabulary } from "./severity.js";

export interface Reporter {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Writes already-labeled text through unchanged. */
  raw(text: string): void;
}

interface WritableLike {
  write(chunk: string): unknown;
}

export interface StreamReporterOptions {
  readonly vocabulary?: SeverityVocabulary;
  readonly stdout?: WritableLike;
  readonly stderr?: WritableLike;
}

function labelLines(label: string, message: string): string {
  return message
    .split("\n")
    .map((line) => `${label} ${line}`)
    .join("\n");
}

export function createStreamReporter(options: StreamReporterOptions = {}): Reporter {
  const vocabulary = options.vocabulary ?? PLAIN_VOCABULARY;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  return {
    info(message) {
      stdout.write(`${labelLines(vocabulary.info, message)}\n`);
    },
    warning(message) {
      stderr.write(`${labelLines(vocabulary.warning, message)}\n`);
    },
    error(message) {
      stderr.write(`${labelLines(vocabulary.error, message)}\n`);
    },
    raw(text) {
      stdout.write(text.endsWith("\n") ? text : `${text}\n`);
    },
  };
}

export interface ReportedLine {
  readonly severity: Severity | "raw";
  readonly message: string;
}

export interface MemoryReporter extends Reporter {
  readonly lines: readonly ReportedLine[];
}

export function createMemoryReporter(): MemoryReporter {
  const lines: ReportedLine[] = [];
  return {
    lines,
    info(message) {
      lines.push({ severity: "info", message });
    },
    warning(message) {
      lines.push({ severity: "warning", message });
    },
    error(message) {
      lines.push({ severity: "error", message });
    },
    raw(text) {
      lines.push({ severity: "raw", message: text });
    },
  };
}

export const silentReporter: Reporter = {
  info() {},
  warning() {},
  error() {},
  raw() {},
};
