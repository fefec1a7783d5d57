/**
 * Value extractor — ordered cells of the value column
 */

import type { WorkSheet } from "xlsx";
import type { ExtractOptions, ExtractedRow } from "@/types";
import { cellText, getCell, parseCell, sheetRange } from "@/utils";

/**
 * Last row (1-based, inclusive) the extractor may read
 */
function lastRowToRead(sheet: WorkSheet, options: ExtractOptions): number {
  const lastRow = sheetRange(sheet).e.r + 1;
  if (options.rowStop === "index_row" && options.rowStopIndex !== undefined) {
    return Math.min(options.rowStopIndex, lastRow);
  }
  return lastRow;
}

/**
 * Read the value column of a sheet in row order
 *
 * Starts at options.rowStart. With "on_blank" the first empty cell ends the
 * read (and is not returned); with "end_of_sheet" and "index_row" empty
 * cells are returned as blank rows. Text cells never end the read.
 *
 * @param column - 1-based value column
 */
export function extractColumnValues(
  sheet: WorkSheet,
  column: number,
  options: ExtractOptions,
): ExtractedRow[] {
  const rows: ExtractedRow[] = [];
  const lastRow = lastRowToRead(sheet, options);

  for (let row = options.rowStart; row <= lastRow; row++) {
    const cell = parseCell(getCell(sheet, row, column));

    if (cell.kind === "blank" && options.rowStop === "on_blank") {
      break;
    }

    const extracted: ExtractedRow = { row, cell };
    if (options.partitionColumn !== undefined) {
      extracted.partitionKey = cellText(
        getCell(sheet, row, options.partitionColumn),
      );
    }
    rows.push(extracted);
  }

  return rows;
}
