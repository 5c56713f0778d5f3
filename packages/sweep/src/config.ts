import AjvModule from "ajv";
import type { JSONSchemaType } from "ajv";

import { CharacterizationError } from "@inexact/core";

const Ajv = AjvModule.default;

export interface HarnessConfig {
  /** Executable that hosts the harness. */
  readonly command: string;
  /** Arguments placed before the test selector. */
  readonly args: readonly string[];
  readonly cwd: string;
  /** Directory holding one result directory per test identifier. */
  readonly resultRoot: string;
  readonly resultFile: string;
  /** Upper bound per invocation; 0 waits indefinitely. */
  readonly timeoutMs: number;
}

type MutableConfig = { -readonly [K in keyof HarnessConfig]: HarnessConfig[K] extends readonly string[] ? string[] : HarnessConfig[K] };

const harnessConfigSchema: JSONSchemaType<MutableConfig> = {
  $id: "https://inexact.dev/schema/harness-config.json",
  type: "object",
  additionalProperties: false,
  required: ["command", "args", "cwd", "resultRoot", "resultFile", "timeoutMs"],
  properties: {
    command: { type: "string", minLength: 1 },
    args: { type: "array", items: { type: "string" } },
    cwd: { type: "string", minLength: 1 },
    resultRoot: { type: "string", minLength: 1 },
    resultFile: { type: "string", minLength: 1 },
    timeoutMs: { type: "integer", minimum: 0 },
  },
};

const ajv = new Ajv({ allErrors: true, strict: false });
const validateHarnessConfig = ajv.compile<MutableConfig>(harnessConfigSchema);

export const DEFAULT_HARNESS_CONFIG: HarnessConfig = {
  command: "sbt",
  args: [],
  cwd: ".",
  resultRoot: "./output",
  resultFile: "errors.bin",
  timeoutMs: 10 * 60 * 1000,
};

export const ENV_PREFIX = "INEXACT_HARNESS_";

function fromEnv(env: NodeJS.ProcessEnv): Partial<HarnessConfig> {
  const overrides: { -readonly [K in keyof HarnessConfig]?: HarnessConfig[K] } = {};
  const command = env[`${ENV_PREFIX}COMMAND`];
  const cwd = env[`${ENV_PREFIX}CWD`];
  const resultRoot = env[`${ENV_PREFIX}RESULT_ROOT`];
  const timeout = env[`${ENV_PREFIX}TIMEOUT_MS`];
  if (command) {
    overrides.command = command;
  }
  if (cwd) {
    overrides.cwd = cwd;
  }
  if (resultRoot) {
    overrides.resultRoot = resultRoot;
  }
  if (timeout) {
    overrides.timeoutMs = Number(timeout);
  }
  return overrides;
}

/**
 * Merges defaults, `INEXACT_HARNESS_*` environment variables and explicit
 * overrides (in increasing precedence) and validates the outcome.
 */
export function resolveHarnessConfig(
  overrides: Partial<HarnessConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): HarnessConfig {
  const candidate = {
    ...DEFAULT_HARNESS_CONFIG,
    ...fromEnv(env),
    ...overrides,
  };
  const plain = { ...candidate, args: [...candidate.args] };
  if (!validateHarnessConfig(plain)) {
    throw new CharacterizationError("InvalidConfig", `harness configuration is invalid: ${ajv.errorsText(validateHarnessConfig.errors)}`);
  }
  return Object.freeze(plain);
}
