import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { CanonicalizeError, canonicalJson, canonicalize, withTmpDir } from "../src/index.js";

describe("@inexact/utils", () => {
  it("sorts object keys and drops undefined entries", () => {
    expect(canonicalJson({ b: 1, a: { z: 2, y: [3, 1] }, c: undefined })).toBe('{"a":{"y":[3,1],"z":2},"b":1}\n');
    expect(canonicalJson({ b: 1, a: 2 })).toBe('{"a":2,"b":1}\n');
  });

  it("renders bigints and bigint arrays as decimal strings", () => {
    const grid = [BigInt64Array.from([-1n, 9007199254740993n])];
    expect(canonicalize({ value: -42n, grid })).toEqual({ value: "-42", grid: [["-1", "9007199254740993"]] });
  });

  it("keeps full float precision and normalizes negative zero", () => {
    expect(canonicalize([0.1 + 0.2, 2.7284841053187847e-12, -0])).toEqual([0.30000000000000004, 2.7284841053187847e-12, 0]);
    expect(Object.is(canonicalize(-0), 0)).toBe(true);
  });

  it("rejects non-finite numbers", () => {
    expect(() => canonicalize(Number.NaN)).toThrow(CanonicalizeError);
  });

  it("creates and cleans temporary directories", async () => {
    let tempDir = "";
    await withTmpDir("inexact-utils-", async (dir) => {
      tempDir = dir;
      expect(dir.startsWith(tmpdir())).toBe(true);
      const marker = path.join(dir, "touch.txt");
      await writeFile(marker, "ok", "utf-8");
      expect(existsSync(marker)).toBe(true);
    });
    expect(tempDir).not.toBe("");
    expect(existsSync(tempDir)).toBe(false);
  });
});
