/**
 * Pairing run defaults
 *
 * Sheet layout assumptions and default strategies used when the caller
 * does not override them.
 */

import type {
  PairNumbering,
  ResultColumnStrategy,
  RowStopStrategy,
} from "@/types";

/**
 * Header row number (1-based)
 */
export const HEADER_ROW = 1;

/**
 * First data row number (1-based)
 */
export const DEFAULT_ROW_START = 2;

/**
 * Header regex used to locate the amount column
 */
export const DEFAULT_COLUMN_PATTERN = "^Amount.*";

export const DEFAULT_ROW_STOP: RowStopStrategy = "on_blank";

export const DEFAULT_RESULT_STRATEGY: ResultColumnStrategy = "insert_right";

export const DEFAULT_NUMBERING: PairNumbering = "sequential";

/**
 * Header written above the pair id column
 */
export const DEFAULT_RESULT_HEADER = "Pair ID";

export const ROW_STOP_STRATEGIES: readonly RowStopStrategy[] = [
  "on_blank",
  "end_of_sheet",
  "index_row",
];

export const RESULT_COLUMN_STRATEGIES: readonly ResultColumnStrategy[] = [
  "insert_right",
  "append_end",
  "index_column",
];

export const PAIR_NUMBERINGS: readonly PairNumbering[] = [
  "sequential",
  "magnitude",
];

/**
 * Extensions SheetJS can read
 */
export const SUPPORTED_INPUT_EXTENSIONS: readonly string[] = [
  ".xlsx",
  ".xlsm",
  ".xlsb",
  ".xls",
  ".ods",
];

/**
 * Binary workbooks are written back as .xlsx when no output path is given
 */
export const XLSB_EXTENSION = ".xlsb";
export const DEFAULT_OUTPUT_EXTENSION = ".xlsx";
