/**
 * Unit tests for the micro-logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as logger from "@/logger";

describe("logger", () => {
  beforeEach(() => {
    logger.setLogLevel("info");
  });

  afterEach(() => {
    logger.setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("should format level, message and meta", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.info("Sheet paired", { pairs: 3 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy.mock.calls[0][0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO\] Sheet paired \{"pairs":3\}$/,
    );
  });

  it("should drop messages below the current level", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});

    logger.setLogLevel("warn");
    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("should route errors to console.error", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    logger.error("boom");

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toMatch(/\[ERROR\] boom$/);
  });

  it("should merge bound context into every call", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    logger.withContext({ sheet: "Ledger" }).info("Sheet paired", { pairs: 1 });

    expect(logSpy.mock.calls[0][0]).toMatch(/Sheet paired \{"sheet":"Ledger","pairs":1\}$/);
  });
});

describe("parseLogLevel", () => {
  it("should accept known levels case-insensitively", () => {
    expect(logger.parseLogLevel(" DEBUG ")).toBe("debug");
    expect(logger.parseLogLevel("warn")).toBe("warn");
  });

  it("should reject unknown or missing levels", () => {
    expect(logger.parseLogLevel("verbose")).toBeNull();
    expect(logger.parseLogLevel("toString")).toBeNull();
    expect(logger.parseLogLevel(undefined)).toBeNull();
  });
});
