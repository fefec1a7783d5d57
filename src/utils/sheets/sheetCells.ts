/**
 * Worksheet cell accessors
 *
 * Row and column arguments are 1-based, as shown in spreadsheet UIs.
 */

import * as XLSX from "xlsx";

/**
 * Used range of a sheet (0-based, as decoded by SheetJS), A1 when unset
 */
export function sheetRange(sheet: XLSX.WorkSheet): XLSX.Range {
  return XLSX.utils.decode_range(sheet["!ref"] ?? "A1");
}

export function cellAddress(row: number, column: number): string {
  return XLSX.utils.encode_cell({ r: row - 1, c: column - 1 });
}

export function getCell(
  sheet: XLSX.WorkSheet,
  row: number,
  column: number,
): XLSX.CellObject | undefined {
  const cell: XLSX.CellObject | undefined = sheet[cellAddress(row, column)];
  return cell;
}

export function setNumberCell(
  sheet: XLSX.WorkSheet,
  row: number,
  column: number,
  value: number,
): void {
  sheet[cellAddress(row, column)] = { t: "n", v: value };
}

export function setTextCell(
  sheet: XLSX.WorkSheet,
  row: number,
  column: number,
  text: string,
): void {
  sheet[cellAddress(row, column)] = { t: "s", v: text };
}

export function clearCell(
  sheet: XLSX.WorkSheet,
  row: number,
  column: number,
): void {
  delete sheet[cellAddress(row, column)];
}
