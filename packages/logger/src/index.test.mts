import { describe, expect, it, vi } from "vitest";

import {
  isLoggerLevel,
  LOGGER_LEVELS,
  loggerFactory,
  noopLogger,
} from "./index.mjs";

describe("loggerFactory", () => {
  it("should have all logger methods defined", () => {
    const { logger } = loggerFactory({});
    expect(logger.trace).toBeDefined();
    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
    expect(logger.fatal).toBeDefined();
  });

  it("should forward messages and meta to axe", () => {
    const { logger, axeLogger } = loggerFactory({ level: "debug" });
    const spy = vi.spyOn(axeLogger, "info").mockResolvedValue(undefined);

    logger.info("queue created", { capacity: 4 });

    expect(spy).toHaveBeenCalledWith("queue created", { capacity: 4 });
  });

  it("should route each level to the matching axe method", () => {
    const { logger, axeLogger } = loggerFactory({ level: "trace" });
    const spies = LOGGER_LEVELS.map((level) =>
      vi.spyOn(axeLogger, level).mockResolvedValue(undefined),
    );

    for (const level of LOGGER_LEVELS) {
      logger[level](`${level} message`);
    }

    LOGGER_LEVELS.forEach((level, index) => {
      expect(spies[index]).toHaveBeenCalledTimes(1);
      expect(spies[index]).toHaveBeenCalledWith(`${level} message`, undefined);
    });
  });
});

describe("isLoggerLevel", () => {
  it("should accept known levels", () => {
    expect(isLoggerLevel("debug")).toBe(true);
    expect(isLoggerLevel("fatal")).toBe(true);
  });

  it("should reject anything else", () => {
    expect(isLoggerLevel("verbose")).toBe(false);
    expect(isLoggerLevel("")).toBe(false);
    expect(isLoggerLevel(3)).toBe(false);
    expect(isLoggerLevel(undefined)).toBe(false);
  });
});

describe("noopLogger", () => {
  it("should accept every level without output", () => {
    const spy = vi.spyOn(console, "info").mockImplementation(() => undefined);

    noopLogger.info("ignored", { key: "value" });
    noopLogger.error(new Error("ignored"));

    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
