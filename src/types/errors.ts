/**
 * Error code definitions
 *
 * Shapes only; the error classes live in @/errors.
 */

export type PairingErrorCode =
  | "INVALID_INPUT_FILE"
  | "SHEET_NOT_FOUND"
  | "COLUMN_NOT_FOUND"
  | "INVALID_OPTIONS"
  | "OUTPUT_WRITE_FAILED";
