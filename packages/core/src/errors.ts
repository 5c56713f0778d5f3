import type { DeclaredParameter } from "./types.js";

export type ProtocolErrorCode = "MalformedHeader" | "SizeMismatch";

export type RangeErrorCode = "InvalidRange" | "InvalidRangeComponent";

export type BindingErrorCode = "MissingArgument" | "DuplicateNamedArgument" | "UnknownNamedArgument";

export type HarnessErrorCode =
  | "NotFound"
  | "CompileError"
  | "DidNotExecute"
  | "RuntimeError"
  | "UnsupportedModule"
  | "MalformedMetadata";

export type InvocationErrorCode = "HarnessTimeout" | "HarnessUnavailable" | "HarnessOutputOverflow";

export type ErrorCode =
  | ProtocolErrorCode
  | RangeErrorCode
  | BindingErrorCode
  | HarnessErrorCode
  | InvocationErrorCode
  | "InvalidConfig"
  | "InvalidArtifact";

export interface ErrorDetails {
  readonly token?: string;
  readonly component?: "start" | "stop" | "step";
  readonly expected?: readonly DeclaredParameter[];
  readonly diagnostic?: string;
  readonly testName?: string;
}

export class CharacterizationError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = "CharacterizationError";
    this.code = code;
    this.details = details;
  }
}

export function isCharacterizationError(value: unknown, code?: ErrorCode): value is CharacterizationError {
  if (!(value instanceof CharacterizationError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

export function describeParameters(parameters: readonly DeclaredParameter[]): string {
  if (parameters.length === 0) {
    return "(no parameters)";
  }
  const width = Math.max(...parameters.map((parameter) => parameter.name.length));
  return parameters
    .map((parameter) => {
      const suffix = parameter.defaultValue === undefined ? "(required)" : `(defaults to ${parameter.defaultValue})`;
      return `- ${parameter.name.padEnd(width, " ")} ${suffix}`;
    })
    .join("\n");
}

/** Human-readable rendering of an error and whatever context it carries. */
export function formatError(error: CharacterizationError): string {
  const lines = [`${error.code}: ${error.message}`];
  const { details } = error;
  if (details.expected) {
    lines.push("Expected parameters:", describeParameters(details.expected));
  }
  if (details.diagnostic) {
    lines.push(details.diagnostic);
  }
  return lines.join("\n");
}
