/**
 * Result writer — pair id column placement and cell writes
 */

import * as XLSX from "xlsx";
import type { ExtractedRow, WriteOptions } from "@/types";
import { HEADER_ROW } from "@/constants";
import { InvalidOptionsError } from "@/errors";
import {
  clearCell,
  setNumberCell,
  setTextCell,
  sheetRange,
} from "@/utils";

/**
 * Insert an empty column, shifting every cell at or right of it by one
 *
 * Merged ranges and column widths follow the shift. Formula text is left
 * as is.
 *
 * @param column - 1-based position of the new column
 */
export function insertColumn(sheet: XLSX.WorkSheet, column: number): void {
  const insertAt = column - 1;

  const moves: { address: string; cell: XLSX.CellAddress }[] = [];
  for (const address of Object.keys(sheet)) {
    if (address.startsWith("!")) continue;
    const cell = XLSX.utils.decode_cell(address);
    if (cell.c >= insertAt) {
      moves.push({ address, cell });
    }
  }

  // Rightmost first so no cell lands on one not yet moved
  moves.sort((a, b) => b.cell.c - a.cell.c);
  for (const { address, cell } of moves) {
    sheet[XLSX.utils.encode_cell({ r: cell.r, c: cell.c + 1 })] = sheet[address];
    delete sheet[address];
  }

  if (sheet["!ref"]) {
    const range = sheetRange(sheet);
    if (range.e.c >= insertAt) {
      range.e.c++;
    }
    if (range.s.c >= insertAt) {
      range.s.c++;
    }
    sheet["!ref"] = XLSX.utils.encode_range(range);
  }

  for (const merge of sheet["!merges"] ?? []) {
    if (merge.s.c >= insertAt) {
      merge.s.c++;
      merge.e.c++;
    } else if (merge.e.c >= insertAt) {
      merge.e.c++;
    }
  }

  const columns = sheet["!cols"];
  if (columns && columns.length > insertAt) {
    columns.splice(insertAt, 0, {});
  }
}

/**
 * Grow the used range so it covers a 1-based cell
 */
function coverCell(sheet: XLSX.WorkSheet, row: number, column: number): void {
  if (!sheet["!ref"]) {
    sheet["!ref"] = XLSX.utils.encode_range({
      s: { r: row - 1, c: column - 1 },
      e: { r: row - 1, c: column - 1 },
    });
    return;
  }
  const range = sheetRange(sheet);
  range.s.r = Math.min(range.s.r, row - 1);
  range.s.c = Math.min(range.s.c, column - 1);
  range.e.r = Math.max(range.e.r, row - 1);
  range.e.c = Math.max(range.e.c, column - 1);
  sheet["!ref"] = XLSX.utils.encode_range(range);
}

/**
 * Pick (and for insert_right create) the 1-based result column
 */
function prepareResultColumn(sheet: XLSX.WorkSheet, options: WriteOptions): number {
  switch (options.strategy) {
    case "insert_right": {
      const column = options.sourceColumn + 1;
      insertColumn(sheet, column);
      return column;
    }
    case "append_end":
      return sheet["!ref"] ? sheetRange(sheet).e.c + 2 : options.sourceColumn + 1;
    case "index_column":
      if (options.resultColumn === undefined || options.resultColumn < 1) {
        throw new InvalidOptionsError([
          "a result column >= 1 is required with the index_column strategy",
        ]);
      }
      return options.resultColumn;
  }
}

/**
 * Write pair ids next to the extracted rows
 *
 * Numeric rows get their id, or an empty cell when unpaired. Blank and
 * text rows are left untouched. The header goes in row 1 when data starts
 * below it.
 *
 * @param rows - Rows returned by extractColumnValues
 * @param pairIds - Matcher output, parallel to rows
 * @returns 1-based result column
 */
export function writePairIds(
  sheet: XLSX.WorkSheet,
  rows: readonly ExtractedRow[],
  pairIds: readonly (number | null)[],
  options: WriteOptions,
): number {
  if (rows.length !== pairIds.length) {
    throw new RangeError(
      `pair ids (${pairIds.length}) do not line up with rows (${rows.length})`,
    );
  }

  const column = prepareResultColumn(sheet, options);

  if (options.resultHeader && options.rowStart > HEADER_ROW) {
    setTextCell(sheet, HEADER_ROW, column, options.resultHeader);
    coverCell(sheet, HEADER_ROW, column);
  }

  rows.forEach((extracted, i) => {
    if (extracted.cell.kind !== "number") {
      return;
    }
    const pairId = pairIds[i];
    if (pairId === null) {
      clearCell(sheet, extracted.row, column);
      return;
    }
    setNumberCell(sheet, extracted.row, column, pairId);
    coverCell(sheet, extracted.row, column);
  });

  return column;
}
