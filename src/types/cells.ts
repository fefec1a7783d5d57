/**
 * Spreadsheet cell type definitions
 */

/**
 * Classified value of a single spreadsheet cell
 *
 * Only the "number" variant takes part in pairing; "blank" and "text"
 * cells pass through without a pair id.
 */
export type Cell =
  | { kind: "number"; value: number }
  | { kind: "blank" }
  | { kind: "text"; text: string };

/**
 * One cell read from the source column
 */
export type ExtractedRow = {
  /** 1-based row number in the sheet */
  row: number;
  /** Classified cell value */
  cell: Cell;
  /** Partition column text, when partitioning is enabled */
  partitionKey?: string;
};
