/**
 * Spreadsheet cell parsing utilities
 *
 * Pure functions classifying SheetJS cells into the tagged Cell value.
 * Used by the value extractor and column resolver.
 */

import type { CellObject } from "xlsx";
import type { Cell } from "@/types";

/**
 * Classify a SheetJS cell
 *
 * - number: numeric cell with a finite value
 * - blank: missing cell, stub cell, empty string or error cell
 * - text: everything else (strings, booleans, dates)
 *
 * @param cell - Cell object from the worksheet, undefined when absent
 */
export function parseCell(cell: CellObject | undefined): Cell {
  if (!cell || cell.v === undefined || cell.v === null) {
    return { kind: "blank" };
  }

  switch (cell.t) {
    case "n":
      return typeof cell.v === "number" && Number.isFinite(cell.v)
        ? { kind: "number", value: cell.v }
        : { kind: "blank" };
    case "z":
    case "e":
      return { kind: "blank" };
    case "s":
      return typeof cell.v === "string" && cell.v !== ""
        ? { kind: "text", text: cell.v }
        : { kind: "blank" };
    default:
      return { kind: "text", text: cellText(cell) };
  }
}

/**
 * Display text of a cell: formatted text when SheetJS produced one,
 * otherwise the raw value as a string. Empty string for absent cells.
 */
export function cellText(cell: CellObject | undefined): string {
  if (!cell || cell.v === undefined || cell.v === null) {
    return "";
  }
  if (typeof cell.w === "string") {
    return cell.w;
  }
  if (cell.v instanceof Date) {
    return cell.v.toISOString();
  }
  return String(cell.v);
}

/**
 * Numeric value of a classified cell, null for blank and text cells
 */
export function cellNumber(cell: Cell): number | null {
  return cell.kind === "number" ? cell.value : null;
}
