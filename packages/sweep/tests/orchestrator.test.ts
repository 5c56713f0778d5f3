import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { createMemoryReporter, isCharacterizationError } from "@inexact/core";
import { encodeExhaustive } from "@inexact/decoder";
import { withTmpDir } from "@inexact/utils";

import {
  DEFAULT_HARNESS_CONFIG,
  resultFilePath,
  runSweep,
  type HarnessConfig,
  type HarnessFlag,
  type HarnessRunner,
} from "../src/index.js";

const PROBE_OUTPUT = [
  "[info] AdderSpec:",
  "[harness-error] Missing arguments for AdderSpec:",
  "[harness-error] - width : Int (missing)",
  "[harness-error] - approx : Int (defaults to 0)",
  "[error] Failed tests: AdderSpec",
].join("\n");

const SUCCESS_OUTPUT = [
  "[info] compiling",
  "[harness-info] exhaustive unsigned adder characterization",
  "[harness-warning] slow backend",
].join("\n");

/**
 * Answers the parameterless probe with the declared parameters and every
 * other run by writing a 2-bit grid filled with the `approx` value.
 */
class ScriptedRunner implements HarnessRunner {
  readonly calls: (readonly HarnessFlag[])[] = [];

  constructor(
    private readonly config: HarnessConfig,
    private readonly outputs: { probe?: string; failOn?: string } = {},
  ) {}

  async run(testName: string, flags: readonly HarnessFlag[]): Promise<string> {
    this.calls.push(flags);
    if (flags.length === 0) {
      return this.outputs.probe ?? PROBE_OUTPUT;
    }
    const approx = flags.find((flag) => flag.name === "approx")?.value ?? "0";
    if (approx === this.outputs.failOn) {
      return "[harness-error] approximation overflows the width";
    }
    const filePath = resultFilePath(this.config, testName);
    await mkdir(path.dirname(filePath), { recursive: true });
    const row = () => BigInt64Array.from([0, 1, 2, 3].map(() => BigInt(approx)));
    await writeFile(filePath, encodeExhaustive([row(), row(), row(), row()], 2));
    return SUCCESS_OUTPUT;
  }
}

async function sweepErrorCode(promise: Promise<unknown>): Promise<string | undefined> {
  try {
    await promise;
  } catch (error) {
    return isCharacterizationError(error) ? error.code : "unexpected";
  }
  return undefined;
}

describe("runSweep", () => {
  it("runs every sweep point and decodes its result", async () => {
    await withTmpDir("inexact-sweep-", async (dir) => {
      const config = { ...DEFAULT_HARNESS_CONFIG, cwd: dir };
      const runner = new ScriptedRunner(config);
      const reporter = createMemoryReporter();

      const highlight = (value: string): string => `<${value}>`;

      const results = await runSweep(
        { testName: "AdderSpec", args: ["2", "approx=0:1"] },
        { runner, config, reporter, highlight },
      );

      expect(runner.calls).toEqual([
        [],
        [
          { name: "width", value: "2" },
          { name: "approx", value: "0" },
        ],
        [
          { name: "width", value: "2" },
          { name: "approx", value: "1" },
        ],
      ]);
      expect(results.map((result) => result.params)).toEqual([
        ["2", "0"],
        ["2", "1"],
      ]);
      const [first, second] = results;
      expect(first.kind).toBe("exhaustive");
      expect(first.bitWidth).toBe(2);
      expect(first.signed).toBe(false);
      expect(first.module).toBe("adder");
      if (first.kind === "exhaustive" && second.kind === "exhaustive") {
        expect(first.errors[3][3]).toBe(0n);
        expect(second.errors[3][3]).toBe(1n);
      }
      expect(reporter.lines.slice(0, 3)).toEqual([
        { severity: "info", message: "Running characterizer AdderSpec with parameters width=2 approx=0" },
        { severity: "info", message: "Analyzing output from characterizer AdderSpec" },
        { severity: "info", message: "Found results of exhaustive characterization" },
      ]);
      expect(reporter.lines[3]).toEqual({
        severity: "info",
        message: "Running characterizer AdderSpec with parameters width=2 approx=<1>",
      });
    });
  });

  it("passes harness messages through when verbose", async () => {
    await withTmpDir("inexact-sweep-", async (dir) => {
      const config = { ...DEFAULT_HARNESS_CONFIG, cwd: dir };
      const reporter = createMemoryReporter();
      await runSweep(
        { testName: "AdderSpec", args: ["2"], verbose: true },
        { runner: new ScriptedRunner(config), config, reporter },
      );
      expect(reporter.lines.filter((line) => line.severity === "raw").map((line) => line.message)).toEqual([
        "[inexact-info] exhaustive unsigned adder characterization",
        "[inexact-warning] slow backend",
      ]);
    });
  });

  it("warns about extra positional arguments", async () => {
    await withTmpDir("inexact-sweep-", async (dir) => {
      const config = { ...DEFAULT_HARNESS_CONFIG, cwd: dir };
      const reporter = createMemoryReporter();
      await runSweep({ testName: "AdderSpec", args: ["2", "0", "9"] }, { runner: new ScriptedRunner(config), config, reporter });
      expect(reporter.lines.filter((line) => line.severity === "warning")).toEqual([
        { severity: "warning", message: "Ignoring extra arguments 9 to AdderSpec" },
      ]);
    });
  });

  it("stops at the first failing point", async () => {
    await withTmpDir("inexact-sweep-", async (dir) => {
      const config = { ...DEFAULT_HARNESS_CONFIG, cwd: dir };
      const runner = new ScriptedRunner(config, { failOn: "1" });
      const code = await sweepErrorCode(runSweep({ testName: "AdderSpec", args: ["2", "0:2"] }, { runner, config }));
      expect(code).toBe("RuntimeError");
      expect(runner.calls).toHaveLength(3);
    });
  });

  it("fails before running anything when the test is missing", async () => {
    const runner = new ScriptedRunner(DEFAULT_HARNESS_CONFIG, { probe: "[info] No tests to run for Test / testOnly" });
    const code = await sweepErrorCode(runSweep({ testName: "Missing", args: [] }, { runner, config: DEFAULT_HARNESS_CONFIG }));
    expect(code).toBe("NotFound");
    expect(runner.calls).toHaveLength(1);
  });

  it("fails when the test does not compile", async () => {
    const runner = new ScriptedRunner(DEFAULT_HARNESS_CONFIG, { probe: "[error] AdderSpec.src:1: oops\n[error] ^" });
    const code = await sweepErrorCode(runSweep({ testName: "AdderSpec", args: [] }, { runner, config: DEFAULT_HARNESS_CONFIG }));
    expect(code).toBe("CompileError");
  });

  it("requires arguments without defaults", async () => {
    const runner = new ScriptedRunner(DEFAULT_HARNESS_CONFIG);
    const code = await sweepErrorCode(runSweep({ testName: "AdderSpec", args: [] }, { runner, config: DEFAULT_HARNESS_CONFIG }));
    expect(code).toBe("MissingArgument");
    expect(runner.calls).toHaveLength(1);
  });
});
