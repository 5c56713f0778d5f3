import { describe, expect, it } from "vitest";

import { isCharacterizationError } from "@inexact/core";

import { DEFAULT_HARNESS_CONFIG, resolveHarnessConfig } from "../src/index.js";

function configErrorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return isCharacterizationError(error) ? error.code : "unexpected";
  }
  return undefined;
}

describe("resolveHarnessConfig", () => {
  it("falls back to the defaults", () => {
    const config = resolveHarnessConfig({}, {});
    expect(config).toEqual(DEFAULT_HARNESS_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = resolveHarnessConfig(
      { timeoutMs: 1000 },
      { INEXACT_HARNESS_COMMAND: "harness-client", INEXACT_HARNESS_TIMEOUT_MS: "500", INEXACT_HARNESS_RESULT_ROOT: "results" },
    );
    expect(config.command).toBe("harness-client");
    expect(config.resultRoot).toBe("results");
    expect(config.timeoutMs).toBe(1000);
  });

  it("rejects a timeout that is not a whole number", () => {
    expect(configErrorCode(() => resolveHarnessConfig({}, { INEXACT_HARNESS_TIMEOUT_MS: "soon" }))).toBe(
      "InvalidConfig",
    );
    expect(configErrorCode(() => resolveHarnessConfig({ timeoutMs: -1 }, {}))).toBe("InvalidConfig");
  });

  it("rejects an empty command", () => {
    expect(configErrorCode(() => resolveHarnessConfig({ command: "" }, {}))).toBe("InvalidConfig");
  });
});
