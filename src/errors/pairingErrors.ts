/**
 * Pairing run error classes
 *
 * Every failure of a run surfaces as a PairingError subclass carrying a
 * stable code; the CLI reports it once and exits non-zero.
 */

import type { PairingErrorCode } from "@/types";

/**
 * Base class for all terminal pairing run failures
 */
export class PairingError extends Error {
  public readonly code: PairingErrorCode;

  constructor(code: PairingErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PairingError";
    this.code = code;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Source file missing, unreadable or not a workbook
 */
export class InvalidInputFileError extends PairingError {
  public readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super("INVALID_INPUT_FILE", `Cannot read input file ${path}: ${reason}`, options);
    this.name = "InvalidInputFileError";
    this.path = path;
  }
}

/**
 * None of the requested sheets exist in the workbook
 */
export class SheetNotFoundError extends PairingError {
  public readonly requested: string[];
  public readonly available: string[];

  constructor(requested: string[], available: string[]) {
    super(
      "SHEET_NOT_FOUND",
      `No matching sheet found (requested: ${requested.join(", ") || "none"}; available: ${available.join(", ")})`,
    );
    this.name = "SheetNotFoundError";
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Column index out of range, or no header matches the pattern
 */
export class ColumnNotFoundError extends PairingError {
  public readonly sheetName: string;

  constructor(sheetName: string, detail: string) {
    super("COLUMN_NOT_FOUND", `Column not found in sheet '${sheetName}': ${detail}`);
    this.name = "ColumnNotFoundError";
    this.sheetName = sheetName;
  }
}

/**
 * Option combination rejected before any file is touched
 */
export class InvalidOptionsError extends PairingError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super("INVALID_OPTIONS", `Invalid options: ${problems.join("; ")}`);
    this.name = "InvalidOptionsError";
    this.problems = problems;
  }
}

/**
 * Saving the output workbook failed
 */
export class OutputWriteError extends PairingError {
  public readonly path: string;

  constructor(path: string, reason: string, options?: ErrorOptions) {
    super("OUTPUT_WRITE_FAILED", `Cannot write output file ${path}: ${reason}`, options);
    this.name = "OutputWriteError";
    this.path = path;
  }
}

export function isPairingError(err: unknown): err is PairingError {
  return err instanceof PairingError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
