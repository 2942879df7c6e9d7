import { describe, it, expect, afterEach, vi } from "vitest";
import { createLogger, getLogLevel, isLogLevel } from "../src/utils/logger.js";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe("createLogger()", () => {
    it("should prefix lines with the scope", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      createLogger("cpor:test", "INFO").warn("careful", 1);

      expect(warn).toHaveBeenCalledWith("[cpor:test]", "careful", 1);
    });

    it("should drop lines below the fixed level", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
      const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
      const logger = createLogger("cpor:test", "WARNING");

      logger.info("hidden");
      logger.error("shown");

      expect(log).not.toHaveBeenCalled();
      expect(error).toHaveBeenCalledWith("[cpor:test]", "shown");
    });

    it("should follow the environment when no level is given", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const logger = createLogger("cpor:test");

      vi.stubEnv("CPOR_LOG_LEVEL", "ERROR");
      logger.warn("hidden");
      vi.stubEnv("CPOR_LOG_LEVEL", "WARNING");
      logger.warn("shown");

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith("[cpor:test]", "shown");
    });
  });

  describe("getLogLevel()", () => {
    it("should prefer CPOR_LOG_LEVEL, case-insensitively", () => {
      expect(getLogLevel({ CPOR_LOG_LEVEL: "debug", LOG_LEVEL: "ERROR" })).toBe("DEBUG");
    });

    it("should fall back to LOG_LEVEL", () => {
      expect(getLogLevel({ LOG_LEVEL: "ERROR" })).toBe("ERROR");
      expect(getLogLevel({ CPOR_LOG_LEVEL: "verbose", LOG_LEVEL: "warning" })).toBe(
        "WARNING"
      );
    });

    it("should default to INFO", () => {
      expect(getLogLevel({})).toBe("INFO");
    });
  });

  describe("isLogLevel()", () => {
    it("should accept upper-case level names only", () => {
      expect(isLogLevel("WARNING")).toBe(true);
      expect(isLogLevel("warning")).toBe(false);
      expect(isLogLevel("TRACE")).toBe(false);
    });
  });
});
