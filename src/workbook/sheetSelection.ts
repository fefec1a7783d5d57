/**
 * Sheet selection — resolve tab names and positions to worksheets
 */

import type { WorkBook, WorkSheet } from "xlsx";
import type { SheetSelector } from "@/types";
import { InvalidOptionsError, SheetNotFoundError } from "@/errors";
import * as logger from "@/logger";

export type SelectedSheet = {
  name: string;
  sheet: WorkSheet;
};

/**
 * Resolve the requested sheets of a workbook
 *
 * Positions (1-based) are translated to names and appended after the
 * explicit names; duplicates are dropped keeping the first occurrence.
 * Unknown names and out-of-range positions are logged and skipped.
 *
 * @throws InvalidOptionsError when neither names nor positions are given
 * @throws SheetNotFoundError when no requested sheet exists
 */
export function resolveSheets(
  workbook: WorkBook,
  selector: SheetSelector,
): SelectedSheet[] {
  if (selector.names.length === 0 && selector.indexes.length === 0) {
    throw new InvalidOptionsError(["a sheet name or sheet index is required"]);
  }

  const requested: string[] = [...selector.names];
  for (const position of selector.indexes) {
    const name = workbook.SheetNames[position - 1];
    if (position < 1 || name === undefined) {
      logger.warn("Sheet index out of range", {
        index: position,
        sheetCount: workbook.SheetNames.length,
      });
      continue;
    }
    requested.push(name);
  }

  const selected: SelectedSheet[] = [];
  const seen = new Set<string>();

  for (const name of requested) {
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);

    const sheet = workbook.Sheets[name];
    if (!workbook.SheetNames.includes(name) || !sheet) {
      logger.warn(`Sheet '${name}' not found in input file`);
      continue;
    }
    selected.push({ name, sheet });
  }

  if (selected.length === 0) {
    throw new SheetNotFoundError(
      [
        ...selector.names,
        ...selector.indexes.map((position) => `#${position}`),
      ],
      workbook.SheetNames,
    );
  }

  return selected;
}
