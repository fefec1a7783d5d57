/**
 * pair-opposites command definition
 *
 * Builds the commander program; the entry point (src/main.ts) only parses
 * process.argv and maps failures to the exit code.
 */

import { Command, InvalidArgumentError } from "commander";
import type { CliOptions, LogLevel, PairingOptions } from "@/types";
import {
  CLI_NAME,
  CLI_VERSION,
  DEFAULT_COLUMN_PATTERN,
  DEFAULT_NUMBERING,
  DEFAULT_RESULT_HEADER,
  DEFAULT_RESULT_STRATEGY,
  DEFAULT_ROW_START,
  DEFAULT_ROW_STOP,
  PAIR_NUMBERINGS,
  RESULT_COLUMN_STRATEGIES,
  ROW_STOP_STRATEGIES,
  VERBOSITY_LOG_LEVELS,
} from "@/constants";
import { runPairing } from "@/pairing";
import * as logger from "@/logger";

function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parseInt(trimmed, 10);
}

function collectString(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function collectInteger(value: string, previous: number[]): number[] {
  return [...previous, parseInteger(value)];
}

/**
 * Parser accepting only the listed values
 */
function oneOf<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value) => {
    const choice = choices.find((candidate) => candidate === value);
    if (choice === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(", ")}.`);
    }
    return choice;
  };
}

/**
 * Map --verbose (0..2) to a log level
 */
export function verbosityToLogLevel(verbose: number): LogLevel | null {
  return VERBOSITY_LOG_LEVELS[verbose] ?? null;
}

function parseVerbosity(value: string): number {
  const verbose = parseInteger(value);
  if (verbosityToLogLevel(verbose) === null) {
    throw new InvalidArgumentError(
      `Must be between 0 and ${VERBOSITY_LOG_LEVELS.length - 1}.`,
    );
  }
  return verbose;
}

/**
 * Translate parsed flags into run options
 */
export function toPairingOptions(input: string, opts: CliOptions): PairingOptions {
  return {
    inputPath: input,
    outputPath: opts.output,
    sheets: { names: opts.tab, indexes: opts.tabIndex },
    column: { index: opts.columnIndex, pattern: opts.columnPattern },
    rowStart: opts.rowStart,
    rowStop: opts.rowStop,
    rowStopIndex: opts.rowStopIndex,
    resultStrategy: opts.result,
    resultColumn: opts.resultColumn,
    resultHeader: opts.resultHeader === "" ? undefined : opts.resultHeader,
    partitionColumn: opts.partitionColumn,
    numbering: opts.numbering,
  };
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(
      "Pair opposite values (5 and -5) of a spreadsheet column and write a shared pair id next to each pair.",
    )
    .version(CLI_VERSION)
    .argument("<input>", "Input workbook (.xlsx, .xlsm, .xlsb, .xls, .ods)")
    .option(
      "-o, --output <file>",
      "Output workbook (default: overwrite the input; .xlsb inputs are saved as .xlsx)",
    )
    .option("-t, --tab <name>", "Sheet name to process, repeatable", collectString, [])
    .option(
      "-i, --tab-index <n>",
      "Sheet position to process (starts at 1), repeatable",
      collectInteger,
      [],
    )
    .option(
      "-p, --column-pattern <regex>",
      "Header regex of the value column; the first match wins",
      DEFAULT_COLUMN_PATTERN,
    )
    .option(
      "-c, --column-index <n>",
      "Value column (starts at 1), overrides --column-pattern",
      parseInteger,
    )
    .option("--row-start <n>", "First data row (starts at 1)", parseInteger, DEFAULT_ROW_START)
    .option(
      "--row-stop <strategy>",
      `Where reading stops (${ROW_STOP_STRATEGIES.join(", ")})`,
      oneOf(ROW_STOP_STRATEGIES),
      DEFAULT_ROW_STOP,
    )
    .option(
      "--row-stop-index <n>",
      "Last row read (inclusive), with --row-stop index_row",
      parseInteger,
    )
    .option(
      "--result <strategy>",
      `Where the pair id column goes (${RESULT_COLUMN_STRATEGIES.join(", ")})`,
      oneOf(RESULT_COLUMN_STRATEGIES),
      DEFAULT_RESULT_STRATEGY,
    )
    .option(
      "--result-column <n>",
      "Pair id column (starts at 1), with --result index_column",
      parseInteger,
    )
    .option(
      "--result-header <text>",
      "Header of the pair id column, empty for none",
      DEFAULT_RESULT_HEADER,
    )
    .option(
      "--partition-column <n>",
      "Only pair rows sharing the same value in this column (starts at 1)",
      parseInteger,
    )
    .option(
      "--numbering <scheme>",
      `Pair id numbering (${PAIR_NUMBERINGS.join(", ")})`,
      oneOf(PAIR_NUMBERINGS),
      DEFAULT_NUMBERING,
    )
    .option(
      "-v, --verbose <level>",
      "0 = warnings and errors, 1 = general, 2 = all (default: LOG_LEVEL, else 1)",
      parseVerbosity,
    )
    .action((input: string, opts: CliOptions) => {
      const level =
        opts.verbose === undefined ? null : verbosityToLogLevel(opts.verbose);
      if (level) {
        logger.setLogLevel(level);
      }

      const result = runPairing(toPairingOptions(input, opts));

      logger.info("Pairing finished", {
        output: result.outputPath,
        sheets: result.sheets.length,
        pairs: result.sheets.reduce((sum, sheet) => sum + sheet.pairCount, 0),
      });
    });

  return program;
}
