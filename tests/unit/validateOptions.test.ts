/**
 * Unit tests for pairing option validation
 */

import { describe, it, expect } from "vitest";
import type { PairingOptions } from "@/types";
import { collectOptionProblems, validatePairingOptions } from "@/pairing";
import { InvalidOptionsError } from "@/errors";

function baseOptions(overrides: Partial<PairingOptions> = {}): PairingOptions {
  return {
    inputPath: "ledger.xlsx",
    sheets: { names: ["Ledger"], indexes: [] },
    column: { pattern: "^Amount.*" },
    rowStart: 2,
    rowStop: "on_blank",
    resultStrategy: "insert_right",
    numbering: "sequential",
    ...overrides,
  };
}

describe("collectOptionProblems", () => {
  it("should accept the defaults", () => {
    expect(collectOptionProblems(baseOptions())).toEqual([]);
  });

  it("should require a sheet selector", () => {
    expect(
      collectOptionProblems(baseOptions({ sheets: { names: [], indexes: [] } })),
    ).toEqual(["a sheet name (--tab) or sheet index (--tab-index) is required"]);
  });

  it("should reject non-positive indexes", () => {
    expect(
      collectOptionProblems(
        baseOptions({
          sheets: { names: [], indexes: [0] },
          column: { index: 0, pattern: "^Amount.*" },
          rowStart: 0,
        }),
      ),
    ).toEqual([
      "sheet index must be an integer >= 1 (got 0)",
      "column index must be an integer >= 1 (got 0)",
      "row start must be an integer >= 1 (got 0)",
    ]);
  });

  it("should report an invalid column pattern", () => {
    const problems = collectOptionProblems(baseOptions({ column: { pattern: "[" } }));

    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatch(/^invalid column pattern '\['/);
  });

  it("should ignore the pattern when a column index is given", () => {
    expect(
      collectOptionProblems(baseOptions({ column: { index: 3, pattern: "[" } })),
    ).toEqual([]);
  });

  describe("row stop index", () => {
    it("should be required with index_row", () => {
      expect(collectOptionProblems(baseOptions({ rowStop: "index_row" }))).toEqual([
        "a row stop index is required with the index_row strategy",
      ]);
    });

    it("should not be before the row start", () => {
      expect(
        collectOptionProblems(baseOptions({ rowStop: "index_row", rowStopIndex: 1 })),
      ).toEqual(["row stop index must be an integer >= row start 2 (got 1)"]);
    });

    it("should only be allowed with index_row", () => {
      expect(
        collectOptionProblems(baseOptions({ rowStop: "end_of_sheet", rowStopIndex: 10 })),
      ).toEqual(["a row stop index is only allowed with the index_row strategy"]);
    });
  });

  describe("result column", () => {
    it("should be required with index_column", () => {
      expect(
        collectOptionProblems(baseOptions({ resultStrategy: "index_column" })),
      ).toEqual(["a result column is required with the index_column strategy"]);
    });

    it("should only be allowed with index_column", () => {
      expect(collectOptionProblems(baseOptions({ resultColumn: 4 }))).toEqual([
        "a result column is only allowed with the index_column strategy",
      ]);
    });
  });

  it("should reject a non-positive partition column", () => {
    expect(collectOptionProblems(baseOptions({ partitionColumn: -1 }))).toEqual([
      "partition column must be an integer >= 1 (got -1)",
    ]);
  });
});

describe("validatePairingOptions", () => {
  it("should throw InvalidOptionsError carrying every problem", () => {
    const options = baseOptions({
      sheets: { names: [], indexes: [] },
      resultStrategy: "index_column",
    });

    try {
      validatePairingOptions(options);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidOptionsError);
      if (err instanceof InvalidOptionsError) {
        expect(err.code).toBe("INVALID_OPTIONS");
        expect(err.problems).toHaveLength(2);
      }
    }
  });

  it("should pass valid options", () => {
    expect(() => validatePairingOptions(baseOptions())).not.toThrow();
  });
});
