/**
 * Column selection — locate the value column through the header row
 */

import type { WorkSheet } from "xlsx";
import type { ColumnSelector, ResolvedColumn } from "@/types";
import { HEADER_ROW } from "@/constants";
import { ColumnNotFoundError, InvalidOptionsError, errorMessage } from "@/errors";
import { cellText, getCell, sheetRange } from "@/utils";

/**
 * Compile a header pattern, anchored at the start of the header text
 *
 * @throws InvalidOptionsError when the pattern is not a valid regex
 */
export function compileHeaderPattern(pattern: string): RegExp {
  try {
    return new RegExp(`^(?:${pattern})`);
  } catch (err) {
    throw new InvalidOptionsError([
      `invalid column pattern '${pattern}': ${errorMessage(err)}`,
    ]);
  }
}

function headerText(sheet: WorkSheet, column: number): string {
  return cellText(getCell(sheet, HEADER_ROW, column));
}

/**
 * Resolve the value column of a sheet
 *
 * An explicit 1-based index wins and must lie inside the used range.
 * Otherwise the first header (left to right) matching the pattern is used.
 *
 * @throws ColumnNotFoundError when the index is out of range or no header matches
 */
export function resolveColumn(
  sheetName: string,
  sheet: WorkSheet,
  selector: ColumnSelector,
): ResolvedColumn {
  const range = sheetRange(sheet);
  const lastColumn = range.e.c + 1;

  if (selector.index !== undefined) {
    if (selector.index < 1 || selector.index > lastColumn) {
      throw new ColumnNotFoundError(
        sheetName,
        `column index ${selector.index} is outside 1..${lastColumn}`,
      );
    }
    return { index: selector.index, header: headerText(sheet, selector.index) };
  }

  const regex = compileHeaderPattern(selector.pattern);
  for (let column = range.s.c + 1; column <= lastColumn; column++) {
    const header = headerText(sheet, column);
    if (header !== "" && regex.test(header)) {
      return { index: column, header };
    }
  }

  throw new ColumnNotFoundError(
    sheetName,
    `no header matches pattern '${selector.pattern}'`,
  );
}
