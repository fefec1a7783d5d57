/**
 * Workbook selection, extraction and writing type definitions
 */

import type { PairNumbering } from "./pairing";

/**
 * Where row extraction stops
 *
 * - on_blank: stop at the first empty cell
 * - end_of_sheet: read every row of the used range, empty cells kept as blanks
 * - index_row: like end_of_sheet, but stop after rowStopIndex (inclusive)
 */
export type RowStopStrategy = "on_blank" | "end_of_sheet" | "index_row";

/**
 * Where the pair id column is written
 *
 * - insert_right: new column right of the source column (shifts the rest)
 * - append_end: new column after the last used column
 * - index_column: given column, existing data overwritten
 */
export type ResultColumnStrategy = "insert_right" | "append_end" | "index_column";

export type SheetSelector = {
  /** Sheet names */
  names: string[];
  /** 1-based sheet positions */
  indexes: number[];
};

export type ColumnSelector = {
  /** 1-based column index, takes precedence over pattern */
  index?: number;
  /** Regex matched against the start of header cells */
  pattern: string;
};

export type ResolvedColumn = {
  /** 1-based column index */
  index: number;
  /** Header text of the column, empty when the header cell is blank */
  header: string;
};

export type ExtractOptions = {
  /** 1-based first data row */
  rowStart: number;
  rowStop: RowStopStrategy;
  /** 1-based last row (inclusive), index_row only */
  rowStopIndex?: number;
  /** 1-based partition column */
  partitionColumn?: number;
};

export type WriteOptions = {
  strategy: ResultColumnStrategy;
  /** 1-based source column */
  sourceColumn: number;
  /** 1-based target column, index_column only */
  resultColumn?: number;
  /** Header written in row 1 of the result column */
  resultHeader?: string;
  /** 1-based first data row; the header is only written when > 1 */
  rowStart: number;
};

/**
 * Options of a full pairing run (one CLI invocation)
 */
export type PairingOptions = {
  inputPath: string;
  outputPath?: string;
  sheets: SheetSelector;
  column: ColumnSelector;
  rowStart: number;
  rowStop: RowStopStrategy;
  rowStopIndex?: number;
  resultStrategy: ResultColumnStrategy;
  resultColumn?: number;
  resultHeader?: string;
  partitionColumn?: number;
  numbering: PairNumbering;
};

/**
 * Per-sheet outcome of a pairing run
 */
export type SheetPairingSummary = {
  sheetName: string;
  /** 1-based source column */
  columnIndex: number;
  /** 1-based result column */
  resultColumn: number;
  /** Rows read from the source column */
  rowsRead: number;
  /** Rows holding a number */
  numericRows: number;
  pairCount: number;
  unpairedCount: number;
};

export type PairingRunResult = {
  outputPath: string;
  sheets: SheetPairingSummary[];
};
