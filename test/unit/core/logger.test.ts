/**
 * Logger Tests
 *
 * Tests for src/core/logger.ts
 */

import { beforeEach, describe, expect, test, vi } from "vitest";
import { createLogger, getLogLevel } from "../../../src/core/logger";

describe("Logger", () => {
  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.DEBUG;
  });

  describe("getLogLevel", () => {
    test("should default to warn", () => {
      expect(getLogLevel()).toBe("warn");
    });

    test("should read LOG_LEVEL case-insensitively", () => {
      process.env.LOG_LEVEL = "INFO";
      expect(getLogLevel()).toBe("info");
    });

    test("should switch to debug when DEBUG is set", () => {
      process.env.DEBUG = "1";
      expect(getLogLevel()).toBe("debug");
    });

    test("should ignore unknown levels", () => {
      process.env.LOG_LEVEL = "verbose";
      expect(getLogLevel()).toBe("warn");
    });
  });

  describe("createLogger", () => {
    test("should prefix messages with the namespace on stderr", () => {
      const spy = vi.spyOn(console, "error");
      const log = createLogger("Pagination");

      log.warn("Page 2 failed", 502);

      expect(spy).toHaveBeenCalledWith("[Pagination]", "Page 2 failed", 502);
    });

    test("should drop messages below the active level", () => {
      const spy = vi.spyOn(console, "error");
      const log = createLogger("Decoder");

      log.debug("hidden");
      log.info("hidden");

      expect(spy).not.toHaveBeenCalled();
    });

    test("should pick up level changes at runtime", () => {
      const spy = vi.spyOn(console, "error");
      const log = createLogger("Decoder");

      process.env.LOG_LEVEL = "error";
      log.warn("hidden");
      process.env.LOG_LEVEL = "debug";
      log.debug("shown");

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith("[Decoder]", "shown");
    });
  });
});
