/**
 * CLI constants
 */

export const CLI_NAME = "pair-opposites";

export const CLI_VERSION = "1.0.0";

export const EXIT_CODE_FAILURE = 1;
