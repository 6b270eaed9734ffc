/**
 * Tests for logger.ts
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createLogger } from "../logger.js";

describe("createLogger", () => {
  let consoleSpy: {
    log: ReturnType<typeof jest.spyOn>;
    warn: ReturnType<typeof jest.spyOn>;
    error: ReturnType<typeof jest.spyOn>;
    debug: ReturnType<typeof jest.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, "log").mockImplementation(() => {}),
      warn: jest.spyOn(console, "warn").mockImplementation(() => {}),
      error: jest.spyOn(console, "error").mockImplementation(() => {}),
      debug: jest.spyOn(console, "debug").mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    consoleSpy.log.mockRestore();
    consoleSpy.warn.mockRestore();
    consoleSpy.error.mockRestore();
    consoleSpy.debug.mockRestore();
  });

  it("is silent by default", () => {
    const logger = createLogger();
    logger.log("test");
    logger.warn("test");
    logger.error("test");
    logger.debug("test");

    expect(consoleSpy.log).not.toHaveBeenCalled();
    expect(consoleSpy.warn).not.toHaveBeenCalled();
    expect(consoleSpy.error).not.toHaveBeenCalled();
    expect(consoleSpy.debug).not.toHaveBeenCalled();
  });

  it("routes each level to its console method when not silent", () => {
    const logger = createLogger({ silent: false });
    logger.log("hello");
    logger.warn("careful");
    logger.error("failure!");

    expect(consoleSpy.log).toHaveBeenCalledWith("hello");
    expect(consoleSpy.warn).toHaveBeenCalledWith("careful");
    expect(consoleSpy.error).toHaveBeenCalledWith("failure!");
  });

  it("prepends prefix to string messages", () => {
    const logger = createLogger({ silent: false, prefix: "[Scan]" });
    logger.log("walking", "/tmp/work");
    expect(consoleSpy.log).toHaveBeenCalledWith("[Scan] walking", "/tmp/work");
  });

  it("prepends prefix as its own argument before non-string values", () => {
    const logger = createLogger({ silent: false, prefix: "[Scan]" });
    logger.warn({ repos: 3 });
    expect(consoleSpy.warn).toHaveBeenCalledWith("[Scan]", { repos: 3 });
  });

  it("drops debug output unless debug is enabled", () => {
    const quiet = createLogger({ silent: false });
    quiet.debug("hidden");
    expect(consoleSpy.debug).not.toHaveBeenCalled();

    const verbose = createLogger({ silent: false, debug: true, prefix: "[Hooks]" });
    verbose.debug("elapsed", 42);
    expect(consoleSpy.debug).toHaveBeenCalledWith("[Hooks] elapsed", 42);
  });

  describe('stream: "stderr"', () => {
    it("sends every level to console.error", () => {
      const logger = createLogger({ silent: false, stream: "stderr", prefix: "[Hooks]" });
      logger.log("one");
      logger.warn("two");
      logger.error("three");

      expect(consoleSpy.log).not.toHaveBeenCalled();
      expect(consoleSpy.warn).not.toHaveBeenCalled();
      expect(consoleSpy.error).toHaveBeenCalledTimes(3);
      expect(consoleSpy.error).toHaveBeenNthCalledWith(1, "[Hooks] one");
      expect(consoleSpy.error).toHaveBeenNthCalledWith(3, "[Hooks] three");
    });

    it("writes debug to stderr only when enabled", () => {
      createLogger({ silent: false, stream: "stderr" }).debug("nope");
      expect(consoleSpy.error).not.toHaveBeenCalled();

      createLogger({ silent: false, stream: "stderr", debug: true }).debug("yes");
      expect(consoleSpy.error).toHaveBeenCalledWith("yes");
      expect(consoleSpy.debug).not.toHaveBeenCalled();
    });
  });
});
