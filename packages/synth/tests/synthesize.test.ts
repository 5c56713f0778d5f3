import { describe, expect, it } from "vitest";

import { pairKey, type OperandPairKey, type PairedError, type Random2DResult, type Random3DResult } from "@inexact/core";
import { decodeResult, encodeExhaustive } from "@inexact/decoder";

import {
  applyModel,
  domainOf,
  domainShift,
  fitLine,
  modelName,
  synthesizeModel,
  synthesizeModels,
  varyingParameterIndices,
} from "../src/index.js";

const unit = { name: "AdderSpec", signed: false, module: "adder", params: [] } as const;

function random2d(entries: [bigint, bigint[]][]): Random2DResult {
  return { ...unit, params: ["4"], kind: "random2d", bitWidth: 4, errors: new Map(entries) };
}

function random3d(records: PairedError[]): Random3DResult {
  return {
    ...unit,
    module: "multiplier",
    params: ["4"],
    kind: "random3d",
    bitWidth: 4,
    errors: new Map(records.map((record): [OperandPairKey, PairedError] => [pairKey(record.a, record.b), record])),
  };
}

function zeroGrid(width: number): BigInt64Array[] {
  return Array.from({ length: 1 << width }, () => new BigInt64Array(1 << width));
}

describe("domain segments", () => {
  it("keeps the two most significant bits", () => {
    expect(domainShift(8)).toBe(6);
    expect(domainOf(200n, 6)).toBe(3);
    expect(domainOf(63n, 6)).toBe(0);
    expect(domainOf(-1n, 6)).toBe(3);
  });

  it("clamps the shift for very narrow units", () => {
    expect(domainShift(1)).toBe(0);
    expect(domainOf(1n, domainShift(1))).toBe(1);
  });
});

describe("fitLine", () => {
  it("fits exact linear data", () => {
    expect(fitLine([{ x: 1, y: 3 }, { x: 2, y: 5 }, { x: 3, y: 7 }])).toEqual({ slope: 2, intercept: 1, samples: 3 });
  });

  it("falls back to zero coefficients without observations", () => {
    expect(fitLine([])).toEqual({ slope: 0, intercept: 0, samples: 0 });
  });

  it("fits a flat line through the mean when every x is equal", () => {
    expect(fitLine([{ x: 4, y: 1 }, { x: 4, y: 3 }])).toEqual({ slope: 0, intercept: 2, samples: 2 });
  });
});

describe("synthesizeModel", () => {
  it("reproduces exact addition from an all-zero exhaustive adder", () => {
    const result = decodeResult(encodeExhaustive(zeroGrid(4), 4), "exhaustive", { ...unit, params: ["4"] });
    const model = synthesizeModel(result);
    expect(model.kind).toBe("exact-lookup");
    if (model.kind !== "exact-lookup") {
      return;
    }
    expect(model.errors).toHaveLength(16);
    expect(model.errors.every((row) => row.length === 16 && row.every((value) => value === 0n))).toBe(true);
    for (let a = 0n; a < 16n; a++) {
      for (let b = 0n; b < 16n; b++) {
        expect(applyModel(model, result, a, b)).toBe((a + b) & 15n);
      }
    }
  });

  it("fits one regression per result domain", () => {
    const model = synthesizeModel(
      random2d([
        [12n, []],
        [5n, [-1n, -3n]],
        [3n, [7n]],
        [1n, [2n, 4n]],
        [2n, [5n]],
      ]),
    );
    expect(model).toEqual({
      kind: "segmented-regression",
      bitWidth: 4,
      domainBits: 2,
      shift: 2,
      segments: [
        { slope: 2, intercept: 1, samples: 3 },
        { slope: 0, intercept: -2, samples: 1 },
        { slope: 0, intercept: 0, samples: 0 },
        { slope: 0, intercept: 0, samples: 0 },
      ],
    });
  });

  it("fits identically regardless of key order", () => {
    const entries: [bigint, bigint[]][] = [
      [1n, [1n]],
      [2n, [4n, 2n]],
      [3n, [2n]],
      [9n, [6n]],
      [10n, [-5n]],
    ];
    const forward = synthesizeModel(random2d(entries));
    const backward = synthesizeModel(random2d([...entries].reverse()));
    expect(backward).toEqual(forward);
    expect(synthesizeModel(random2d(entries))).toEqual(forward);
  });

  it("averages errors per operand cell", () => {
    const model = synthesizeModel(
      random3d([
        { a: 1n, b: 2n, error: 4n },
        { a: 2n, b: 3n, error: 2n },
        { a: 12n, b: 4n, error: -5n },
      ]),
    );
    expect(model.kind).toBe("segmented-med");
    if (model.kind !== "segmented-med") {
      return;
    }
    expect(model.cells[0][0]).toEqual({ med: 3, samples: 2 });
    expect(model.cells[3][1]).toEqual({ med: -5, samples: 1 });
    expect(model.cells[2][2]).toEqual({ med: 0, samples: 0 });
    expect(model.cells.flat().reduce((total, cell) => total + cell.samples, 0)).toBe(3);
  });

  it("freezes every model it returns", () => {
    const exact = synthesizeModel(decodeResult(encodeExhaustive(zeroGrid(1), 1), "exhaustive", unit));
    expect(Object.isFrozen(exact)).toBe(true);

    const regression = synthesizeModel(random2d([[1n, [2n]]]));
    expect(Object.isFrozen(regression)).toBe(true);
    if (regression.kind === "segmented-regression") {
      expect(Object.isFrozen(regression.segments)).toBe(true);
      expect(regression.segments.every((segment) => Object.isFrozen(segment))).toBe(true);
    }

    const med = synthesizeModel(random3d([{ a: 1n, b: 2n, error: 4n }]));
    expect(Object.isFrozen(med)).toBe(true);
    if (med.kind === "segmented-med") {
      expect(Object.isFrozen(med.cells)).toBe(true);
      expect(med.cells.every((row) => Object.isFrozen(row) && row.every((cell) => Object.isFrozen(cell)))).toBe(true);
    }
    expect([regression.kind, med.kind]).toEqual(["segmented-regression", "segmented-med"]);
  });
});

describe("applyModel", () => {
  it("corrects by the regression of the exact result", () => {
    const result = random2d([
      [1n, [3n]],
      [2n, [5n]],
      [3n, [7n]],
      [5n, [-2n]],
    ]);
    const model = synthesizeModel(result);
    expect(applyModel(model, result, 1n, 1n)).toBe(7n);
    expect(applyModel(model, result, 2n, 3n)).toBe(3n);
    expect(applyModel(model, result, 8n, 9n)).toBe(4n);
  });

  it("corrects by the mean error of the operand cell", () => {
    const result = random3d([
      { a: 1n, b: 2n, error: 3n },
      { a: 12n, b: 4n, error: -5n },
    ]);
    const model = synthesizeModel(result);
    expect(applyModel(model, result, 1n, 2n)).toBe(5n);
    expect(applyModel(model, result, 12n, 4n)).toBe(11n);
  });

  it("sign-extends results of signed units", () => {
    const signed = { module: "adder", signed: true } as const;
    const model = { kind: "exact-lookup", bitWidth: 4, errors: zeroGrid(4) } as const;
    expect(applyModel(model, signed, 7n, 1n)).toBe(-8n);
    expect(applyModel(model, signed, -8n, -1n)).toBe(7n);
    expect(applyModel(model, signed, -3n, 2n)).toBe(-1n);
  });

  it("rejects operands outside the unit's range", () => {
    const model = { kind: "exact-lookup", bitWidth: 4, errors: zeroGrid(4) } as const;
    expect(() => applyModel(model, unit, 16n, 0n)).toThrow(RangeError);
    expect(() => applyModel(model, { module: "adder", signed: true }, 8n, 0n)).toThrow(RangeError);
  });
});

describe("model naming", () => {
  const results = [
    { module: "adder", params: ["4", "0", "lsb"] },
    { module: "adder", params: ["4", "1", "lsb"] },
    { module: "adder", params: ["4", "2", "lsb"] },
  ] as const;

  it("finds the parameters that vary across the batch", () => {
    expect(varyingParameterIndices(results)).toEqual([1]);
    expect(varyingParameterIndices([])).toEqual([]);
  });

  it("appends the varying values to the module name", () => {
    expect(modelName(results[2], [1])).toBe("adder_2");
    expect(modelName(results[0], [])).toBe("adder");
  });

  it("labels every model of a batch", () => {
    const batch = [0n, 1n].map((error, index) =>
      decodeResult(
        encodeExhaustive(
          zeroGrid(1).map((row) => row.map(() => error)),
          1,
        ),
        "exhaustive",
        { ...unit, params: ["1", String(index)] },
      ),
    );
    const models = synthesizeModels(batch);
    expect(models.map(({ name, labels }) => ({ name, labels }))).toEqual([
      { name: "adder_0", labels: ["0"] },
      { name: "adder_1", labels: ["1"] },
    ]);
    expect(models[1].model.kind).toBe("exact-lookup");
  });
});
