import { execFile } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";

import { CharacterizationError } from "@inexact/core";

import type { HarnessConfig } from "./config.js";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

export interface HarnessFlag {
  readonly name: string;
  readonly value: string;
}

export interface HarnessRunner {
  /** Runs one test with the given flags and resolves with its standard output. */
  run(testName: string, flags: readonly HarnessFlag[]): Promise<string>;
}

export function harnessArguments(config: HarnessConfig, testName: string, flags: readonly HarnessFlag[]): string[] {
  const selector =
    flags.length === 0
      ? `testOnly ${testName}`
      : `testOnly ${testName} -- ${flags.map((flag) => `-D${flag.name}=${flag.value}`).join(" ")}`;
  return [...config.args, selector, "exit"];
}

export function resultFilePath(config: HarnessConfig, testName: string): string {
  return path.resolve(config.cwd, config.resultRoot, testName, config.resultFile);
}

export interface ProcessRunnerOptions {
  /** Largest harness output accepted before the run fails. */
  readonly maxOutputBytes?: number;
}

export class ProcessHarnessRunner implements HarnessRunner {
  private readonly maxOutputBytes: number;

  constructor(
    private readonly config: HarnessConfig,
    options: ProcessRunnerOptions = {},
  ) {
    this.maxOutputBytes = options.maxOutputBytes ?? MAX_OUTPUT_BYTES;
  }

  async run(testName: string, flags: readonly HarnessFlag[]): Promise<string> {
    const args = harnessArguments(this.config, testName, flags);
    try {
      const { stdout } = await execFileAsync(this.config.command, args, {
        cwd: this.config.cwd,
        timeout: this.config.timeoutMs,
        maxBuffer: this.maxOutputBytes,
        encoding: "utf8",
      });
      return stdout;
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      if ("code" in error && error.code === "ENOENT") {
        throw new CharacterizationError(
          "HarnessUnavailable",
          `cannot start harness command ${this.config.command}: ${error.message}`,
          { testName },
        );
      }
      if ("code" in error && error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
        throw new CharacterizationError(
          "HarnessOutputOverflow",
          `harness run of ${testName} wrote more than ${this.maxOutputBytes} bytes`,
          { testName },
        );
      }
      if ("killed" in error && error.killed === true) {
        throw new CharacterizationError(
          "HarnessTimeout",
          `harness run of ${testName} exceeded ${this.config.timeoutMs} ms`,
          { testName },
        );
      }
      // A failing test exits non-zero; its output still goes to the classifier.
      if ("stdout" in error && typeof error.stdout === "string") {
        return error.stdout;
      }
      throw error;
    }
  }
}
