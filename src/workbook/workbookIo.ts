/**
 * Workbook file IO using SheetJS
 *
 * Reads the file bytes with fs and hands them to XLSX.read / XLSX.write,
 * so file system failures and parse failures surface as distinct errors.
 */

import { readFileSync, writeFileSync } from "fs";
import { extname } from "path";
import * as XLSX from "xlsx";
import {
  DEFAULT_OUTPUT_EXTENSION,
  SUPPORTED_INPUT_EXTENSIONS,
  XLSB_EXTENSION,
} from "@/constants";
import { InvalidInputFileError, OutputWriteError, errorMessage } from "@/errors";
import * as logger from "@/logger";

const BOOK_TYPES: Record<string, XLSX.BookType> = {
  ".xlsx": "xlsx",
  ".xlsm": "xlsm",
  ".xlsb": "xlsb",
  ".xls": "biff8",
  ".ods": "ods",
};

function isFileNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

/**
 * Load a workbook from disk
 *
 * @param path - Path to an .xlsx, .xlsm, .xlsb, .xls or .ods file
 * @throws InvalidInputFileError when the file is missing, unreadable,
 *   of an unsupported type, not parseable or has no sheets
 */
export function readWorkbook(path: string): XLSX.WorkBook {
  const extension = extname(path).toLowerCase();
  if (!SUPPORTED_INPUT_EXTENSIONS.includes(extension)) {
    throw new InvalidInputFileError(
      path,
      `unsupported file type '${extension || "(none)"}' (expected ${SUPPORTED_INPUT_EXTENSIONS.join(", ")})`,
    );
  }

  let data: Buffer;
  try {
    data = readFileSync(path);
  } catch (err) {
    throw new InvalidInputFileError(
      path,
      isFileNotFound(err) ? "file not found" : errorMessage(err),
      { cause: err },
    );
  }

  let workbook: XLSX.WorkBook;
  try {
    // Number formats and column widths are kept so the saved file keeps them
    workbook = XLSX.read(data, {
      type: "buffer",
      cellFormula: true,
      cellNF: true,
      cellStyles: true,
    });
  } catch (err) {
    throw new InvalidInputFileError(path, errorMessage(err), { cause: err });
  }

  if (workbook.SheetNames.length === 0) {
    throw new InvalidInputFileError(path, "workbook contains no sheets");
  }

  logger.debug("Workbook loaded", {
    path,
    sheets: workbook.SheetNames.length,
  });

  return workbook;
}

/**
 * Save a workbook, book type inferred from the extension (.xlsx otherwise)
 *
 * @throws OutputWriteError when serialization or the file write fails
 */
export function writeWorkbook(workbook: XLSX.WorkBook, path: string): void {
  const bookType = BOOK_TYPES[extname(path).toLowerCase()] ?? "xlsx";

  try {
    const output: unknown = XLSX.write(workbook, { type: "buffer", bookType });
    if (!(output instanceof Uint8Array)) {
      throw new Error(`unexpected ${bookType} serializer output`);
    }
    writeFileSync(path, output);
  } catch (err) {
    throw new OutputWriteError(path, errorMessage(err), { cause: err });
  }

  logger.debug("Workbook saved", { path, bookType });
}

/**
 * Output path of a run
 *
 * Defaults to overwriting the input; binary (.xlsb) inputs default to the
 * same name with an .xlsx extension.
 */
export function resolveOutputPath(inputPath: string, outputPath?: string): string {
  if (outputPath) {
    return outputPath;
  }
  const extension = extname(inputPath);
  if (extension.toLowerCase() === XLSB_EXTENSION) {
    return inputPath.slice(0, -extension.length) + DEFAULT_OUTPUT_EXTENSION;
  }
  return inputPath;
}
