/**
 * Workbook fixtures
 *
 * Builds in-memory SheetJS workbooks from arrays of rows, and temp
 * directories for tests that touch the file system.
 */

import { mkdtempSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import * as XLSX from "xlsx";

export type SheetRows = (string | number | boolean | null)[][];

export function buildSheet(rows: SheetRows): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet(rows);
}

export function buildWorkbook(sheets: Record<string, SheetRows>): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, buildSheet(rows), name);
  }
  return workbook;
}

/**
 * Raw value of a cell by A1 address, undefined when the cell is absent
 */
export function valueAt(
  sheet: XLSX.WorkSheet,
  address: string,
): string | number | boolean | Date | undefined {
  const cell: XLSX.CellObject | undefined = sheet[address];
  return cell?.v;
}

export interface TempDir {
  path: string;
  file: (name: string) => string;
  cleanup: () => void;
}

export function createTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), "opposite-pairs-"));
  return {
    path,
    file: (name) => join(path, name),
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
