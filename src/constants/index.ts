export * from "./logger";
export * from "./pairing";
export * from "./cli";
