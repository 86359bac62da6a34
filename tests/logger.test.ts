// CHANGE: Verify logger respects configured log level.
// WHY: DEBUG carries cache and HTTP details, WARN stale data, ERROR failed jobs.

import { afterEach, describe, expect, it, vi } from "vitest";
import { debug, error, getLogLevel, info, setLogLevel, warn } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  it("suppresses debug logs when level is info", () => {
    setLogLevel("info");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("emits debug logs when level is debug", () => {
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    debug("visible");
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining("[DEBUG] visible"));
  });

  it("writes warnings and errors to stderr", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    warn("stale listing");
    error("install failed");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy.mock.calls.map(call => String(call[0]))).toEqual([
      expect.stringContaining("[WARN] stale listing"),
      expect.stringContaining("[ERROR] install failed")
    ]);
  });

  it("drops info and warnings at error level", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    info("summary");
    warn("stale listing");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("rejects unknown levels and keeps the current one", () => {
    setLogLevel("warn");
    expect(() => setLogLevel("verbose")).toThrow("Unsupported log level: verbose");
    expect(getLogLevel()).toBe("warn");
  });
});
