#!/usr/bin/env tsx
/**
 * pair-opposites entrypoint
 *
 * Usage:
 *   pair-opposites input.xlsx -o output.xlsx -t 'Sheet 1'
 *   pair-opposites ledger.xlsb -i 2 --column-index 4 --result append_end
 *
 * Environment variables:
 *   - LOG_LEVEL: Logging level (debug, info, warn, error), overridden by --verbose
 */

import "dotenv/config";
import { buildProgram } from "./cli/program";
import { EXIT_CODE_FAILURE } from "./constants";
import { isPairingError } from "./errors";
import * as logger from "./logger";

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((error) => {
  if (isPairingError(error)) {
    logger.error(error.message, { code: error.code });
  } else {
    logger.error("Fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  }
  process.exit(EXIT_CODE_FAILURE);
});
