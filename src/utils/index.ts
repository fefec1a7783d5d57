/**
 * Utils barrel exports
 */

export * from "./sheets/cellParsing";
export * from "./sheets/sheetCells";
