/**
 * CLI type definitions
 */

import type { PairNumbering } from "./pairing";
import type { ResultColumnStrategy, RowStopStrategy } from "./workbook";

/**
 * Parsed flags of the pair-opposites command (commander camelCases them)
 */
export interface CliOptions {
  output?: string;
  tab: string[];
  tabIndex: number[];
  columnPattern: string;
  columnIndex?: number;
  rowStart: number;
  rowStop: RowStopStrategy;
  rowStopIndex?: number;
  result: ResultColumnStrategy;
  resultColumn?: number;
  resultHeader: string;
  partitionColumn?: number;
  numbering: PairNumbering;
  verbose?: number;
}
