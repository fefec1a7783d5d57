/**
 * Pairing run — one invocation across every selected sheet
 *
 * Flow:
 * 1. Validate options
 * 2. Load the workbook
 * 3. Resolve every sheet and its value column (nothing is modified yet)
 * 4. Per sheet: extract → match → write pair ids
 * 5. Save once
 *
 * Any failure before step 5 leaves the output file untouched.
 */

import type { WorkSheet } from "xlsx";
import type {
  PairingOptions,
  PairingRunResult,
  ResolvedColumn,
  SheetPairingSummary,
} from "@/types";
import { matchOppositeRecords } from "@/matching";
import {
  extractColumnValues,
  readWorkbook,
  resolveColumn,
  resolveOutputPath,
  resolveSheets,
  writePairIds,
  writeWorkbook,
} from "@/workbook";
import { cellNumber } from "@/utils";
import * as logger from "@/logger";
import { validatePairingOptions } from "./validateOptions";

type PlannedSheet = {
  name: string;
  sheet: WorkSheet;
  column: ResolvedColumn;
};

/**
 * Pair the value column of one sheet in place
 */
export function pairSheet(
  name: string,
  sheet: WorkSheet,
  column: ResolvedColumn,
  options: PairingOptions,
): SheetPairingSummary {
  const log = logger.withContext({ sheet: name });

  const rows = extractColumnValues(sheet, column.index, {
    rowStart: options.rowStart,
    rowStop: options.rowStop,
    rowStopIndex: options.rowStopIndex,
    partitionColumn: options.partitionColumn,
  });

  const match = matchOppositeRecords(
    rows.map((extracted) => ({
      value: cellNumber(extracted.cell),
      partitionKey: extracted.partitionKey,
    })),
    { numbering: options.numbering },
  );

  const resultColumn = writePairIds(sheet, rows, match.pairIds, {
    strategy: options.resultStrategy,
    sourceColumn: column.index,
    resultColumn: options.resultColumn,
    resultHeader: options.resultHeader,
    rowStart: options.rowStart,
  });

  const summary: SheetPairingSummary = {
    sheetName: name,
    columnIndex: column.index,
    resultColumn,
    rowsRead: rows.length,
    numericRows: rows.filter((extracted) => extracted.cell.kind === "number").length,
    pairCount: match.pairCount,
    unpairedCount: match.unpairedCount,
  };

  log.info("Sheet paired", {
    column: column.header || column.index,
    rowsRead: summary.rowsRead,
    pairs: summary.pairCount,
    unpaired: summary.unpairedCount,
  });

  return summary;
}

/**
 * Run the full pairing flow and save the workbook
 *
 * @throws PairingError subclasses for invalid options, unreadable input,
 *   missing sheets or columns, and failed writes
 */
export function runPairing(options: PairingOptions): PairingRunResult {
  validatePairingOptions(options);

  logger.info("Opening file", { path: options.inputPath });
  const workbook = readWorkbook(options.inputPath);

  const selected = resolveSheets(workbook, options.sheets);
  const planned: PlannedSheet[] = selected.map(({ name, sheet }) => {
    const column = resolveColumn(name, sheet, options.column);
    logger.debug(`Found column '${column.header}' in sheet '${name}'`, {
      columnIndex: column.index,
    });
    return { name, sheet, column };
  });

  const summaries = planned.map(({ name, sheet, column }) =>
    pairSheet(name, sheet, column, options),
  );

  const outputPath = resolveOutputPath(options.inputPath, options.outputPath);
  logger.info("Saving file", { path: outputPath });
  writeWorkbook(workbook, outputPath);

  return { outputPath, sheets: summaries };
}
