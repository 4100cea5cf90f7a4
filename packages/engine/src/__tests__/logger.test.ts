import { afterEach, describe, expect, it, vi } from "vitest";
import { logger, LogLevel, LogSource, parseLogLevel } from "../logger.js";

afterEach(() => {
  logger.setMinLevel(LogLevel.WARN);
  logger.setConsoleEnabled(true);
  logger.clear();
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("echoes entries at or above the minimum level to stderr", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.info(LogSource.IMPORT, "quiet");
    logger.warn(LogSource.IMPORT, "loud");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("[import] loud");
  });

  it("records every entry regardless of level", () => {
    logger.setConsoleEnabled(false);
    logger.debug(LogSource.TEXT, "one");
    logger.error(LogSource.MSG, "two");

    expect(logger.getEntries().map((e) => `${e.level} ${e.source} ${e.message}`)).toEqual([
      "DEBUG text one",
      "ERROR msg two",
    ]);
  });

  it("stops notifying after unsubscribe", () => {
    logger.setConsoleEnabled(false);
    const seen: string[] = [];
    const unsubscribe = logger.subscribe((entry) => seen.push(entry.message));

    logger.warn(LogSource.WELD, "first");
    unsubscribe();
    logger.warn(LogSource.WELD, "second");

    expect(seen).toEqual(["first"]);
  });
});

describe("parseLogLevel", () => {
  it("accepts level names in any case", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("Warn")).toBe(LogLevel.WARN);
    expect(parseLogLevel("ERROR")).toBe(LogLevel.ERROR);
    expect(parseLogLevel("verbose")).toBeNull();
  });
});
