/**
 * Pairing option validation
 *
 * Pure checks run before any file is read. Every problem is collected so
 * the user sees all of them at once.
 */

import type { PairingOptions } from "@/types";
import { InvalidOptionsError, errorMessage } from "@/errors";
import { compileHeaderPattern } from "@/workbook";

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

/**
 * List the problems of an option set, empty when valid
 */
export function collectOptionProblems(options: PairingOptions): string[] {
  const problems: string[] = [];

  if (!options.inputPath) {
    problems.push("an input file is required");
  }

  if (options.sheets.names.length === 0 && options.sheets.indexes.length === 0) {
    problems.push("a sheet name (--tab) or sheet index (--tab-index) is required");
  }
  for (const index of options.sheets.indexes) {
    if (!isPositiveInteger(index)) {
      problems.push(`sheet index must be an integer >= 1 (got ${index})`);
    }
  }

  if (options.column.index !== undefined && !isPositiveInteger(options.column.index)) {
    problems.push(`column index must be an integer >= 1 (got ${options.column.index})`);
  }
  if (options.column.index === undefined) {
    try {
      compileHeaderPattern(options.column.pattern);
    } catch (err) {
      problems.push(
        err instanceof InvalidOptionsError ? err.problems.join("; ") : errorMessage(err),
      );
    }
  }

  if (!isPositiveInteger(options.rowStart)) {
    problems.push(`row start must be an integer >= 1 (got ${options.rowStart})`);
  }

  if (options.rowStop === "index_row") {
    if (options.rowStopIndex === undefined) {
      problems.push("a row stop index is required with the index_row strategy");
    } else if (!isPositiveInteger(options.rowStopIndex) || options.rowStopIndex < options.rowStart) {
      problems.push(
        `row stop index must be an integer >= row start ${options.rowStart} (got ${options.rowStopIndex})`,
      );
    }
  } else if (options.rowStopIndex !== undefined) {
    problems.push("a row stop index is only allowed with the index_row strategy");
  }

  if (options.resultStrategy === "index_column") {
    if (options.resultColumn === undefined) {
      problems.push("a result column is required with the index_column strategy");
    } else if (!isPositiveInteger(options.resultColumn)) {
      problems.push(`result column must be an integer >= 1 (got ${options.resultColumn})`);
    }
  } else if (options.resultColumn !== undefined) {
    problems.push("a result column is only allowed with the index_column strategy");
  }

  if (options.partitionColumn !== undefined && !isPositiveInteger(options.partitionColumn)) {
    problems.push(`partition column must be an integer >= 1 (got ${options.partitionColumn})`);
  }

  return problems;
}

/**
 * @throws InvalidOptionsError listing every problem found
 */
export function validatePairingOptions(options: PairingOptions): void {
  const problems = collectOptionProblems(options);
  if (problems.length > 0) {
    throw new InvalidOptionsError(problems);
  }
}
