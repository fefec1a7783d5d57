export * from "./logger";
export * from "./errors";
export * from "./cells";
export * from "./pairing";
export * from "./workbook";
export * from "./cli";
