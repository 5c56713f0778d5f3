import { CharacterizationError, describeParameters, type DeclaredParameter } from "@inexact/core";

const NAMED_ARGUMENT = /^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

export type ArgumentToken =
  | { readonly kind: "named"; readonly name: string; readonly value: string }
  | { readonly kind: "positional"; readonly value: string };

export interface BoundArgument {
  readonly name: string;
  readonly value: string;
  readonly source: "positional" | "named" | "default";
}

export interface ArgumentBinding {
  readonly bound: readonly BoundArgument[];
  /** Positional tokens beyond the declared parameters. */
  readonly ignored: readonly string[];
}

export function parseArgumentToken(token: string): ArgumentToken {
  const match = NAMED_ARGUMENT.exec(token);
  if (!match) {
    return { kind: "positional", value: token };
  }
  return { kind: "named", name: match[1], value: match[2] };
}

function bindingError(
  code: "MissingArgument" | "DuplicateNamedArgument" | "UnknownNamedArgument",
  message: string,
  declared: readonly DeclaredParameter[],
): CharacterizationError {
  return new CharacterizationError(code, `${message}; expected:\n${describeParameters(declared)}`, {
    expected: declared,
  });
}

/**
 * Assigns argument tokens to declared parameters: positional tokens by slot,
 * `name=value` tokens by name, then declared defaults.
 */
export function bindArguments(declared: readonly DeclaredParameter[], tokens: readonly string[]): ArgumentBinding {
  const known = new Set(declared.map((parameter) => parameter.name));
  const positional: string[] = [];
  const named = new Map<string, string>();

  for (const token of tokens.map(parseArgumentToken)) {
    if (token.kind === "positional") {
      positional.push(token.value);
      continue;
    }
    if (!known.has(token.name)) {
      throw bindingError("UnknownNamedArgument", `unknown named argument ${token.name}`, declared);
    }
    if (named.has(token.name)) {
      throw bindingError("DuplicateNamedArgument", `argument ${token.name} is named more than once`, declared);
    }
    named.set(token.name, token.value);
  }

  const missing: string[] = [];
  const bound: BoundArgument[] = [];
  declared.forEach((parameter, index) => {
    const slot = positional[index];
    const byName = named.get(parameter.name);
    if (slot !== undefined && byName !== undefined) {
      throw bindingError(
        "DuplicateNamedArgument",
        `argument ${parameter.name} is given both by position and by name`,
        declared,
      );
    }
    if (slot !== undefined) {
      bound.push({ name: parameter.name, value: slot, source: "positional" });
    } else if (byName !== undefined) {
      bound.push({ name: parameter.name, value: byName, source: "named" });
    } else if (parameter.defaultValue !== undefined) {
      bound.push({ name: parameter.name, value: parameter.defaultValue, source: "default" });
    } else {
      missing.push(parameter.name);
    }
  });

  if (missing.length > 0) {
    throw bindingError("MissingArgument", `missing arguments ${missing.join(", ")}`, declared);
  }
  return { bound, ignored: positional.slice(declared.length) };
}
