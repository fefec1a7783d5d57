/**
 * Unit tests for workbook file IO
 *
 * Uses a temp directory; no fixtures are committed.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync } from "fs";
import { readWorkbook, resolveOutputPath, writeWorkbook } from "@/workbook";
import { InvalidInputFileError, OutputWriteError } from "@/errors";
import { buildWorkbook, createTempDir, valueAt, type TempDir } from "../helpers/workbooks";

describe("readWorkbook / writeWorkbook", () => {
  let temp: TempDir;

  beforeEach(() => {
    temp = createTempDir();
  });

  afterEach(() => {
    temp.cleanup();
  });

  it("should save and load a workbook", () => {
    const path = temp.file("ledger.xlsx");
    writeWorkbook(buildWorkbook({ Ledger: [["Amount"], [5], [-5]] }), path);

    const loaded = readWorkbook(path);

    expect(loaded.SheetNames).toEqual(["Ledger"]);
    expect(valueAt(loaded.Sheets.Ledger, "A1")).toBe("Amount");
    expect(valueAt(loaded.Sheets.Ledger, "A3")).toBe(-5);
  });

  it("should report a missing file", () => {
    const path = temp.file("missing.xlsx");

    expect(() => readWorkbook(path)).toThrow(
      new InvalidInputFileError(path, "file not found"),
    );
  });

  it("should reject unsupported file types", () => {
    const path = temp.file("ledger.txt");
    writeFileSync(path, "Amount\n5\n");

    expect(() => readWorkbook(path)).toThrow(InvalidInputFileError);
  });

  it("should report unreadable paths", () => {
    const path = temp.file("folder.xlsx");
    mkdirSync(path);

    expect(() => readWorkbook(path)).toThrow(InvalidInputFileError);
  });

  it("should report failed writes", () => {
    const path = temp.file("missing-dir/out.xlsx");

    expect(() => writeWorkbook(buildWorkbook({ Ledger: [["Amount"]] }), path)).toThrow(
      OutputWriteError,
    );
  });
});

describe("resolveOutputPath", () => {
  it("should overwrite the input by default", () => {
    expect(resolveOutputPath("ledger.xlsx")).toBe("ledger.xlsx");
  });

  it("should save binary workbooks as xlsx by default", () => {
    expect(resolveOutputPath("ledger.xlsb")).toBe("ledger.xlsx");
    expect(resolveOutputPath("LEDGER.XLSB")).toBe("LEDGER.xlsx");
  });

  it("should keep an explicit output path", () => {
    expect(resolveOutputPath("ledger.xlsb", "out.xlsb")).toBe("out.xlsb");
  });
});
