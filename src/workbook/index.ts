/**
 * Workbook access public API
 */

export { readWorkbook, writeWorkbook, resolveOutputPath } from "./workbookIo";
export { resolveSheets } from "./sheetSelection";
export type { SelectedSheet } from "./sheetSelection";
export { resolveColumn, compileHeaderPattern } from "./columnSelection";
export { extractColumnValues } from "./valueExtractor";
export { writePairIds, insertColumn } from "./resultWriter";
