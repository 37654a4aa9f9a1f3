/**
 * Tests for Logger utility
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { Logger, getLogger } from "../../src/utils/logger.js";

describe("Logger", () => {
  let consoleLogSpy: jest.SpiedFunction<typeof console.log>;
  let consoleWarnSpy: jest.SpiedFunction<typeof console.warn>;
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    consoleWarnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleWarnSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  describe("Logger class", () => {
    it("should respect SYNCPAIR_DEBUG environment variable", () => {
      const originalEnv = process.env.SYNCPAIR_DEBUG;
      process.env.SYNCPAIR_DEBUG = "true";

      const logger = new Logger();
      logger.debug("from env");
      expect(consoleLogSpy.mock.calls[0][0]).toContain("from env");

      process.env.SYNCPAIR_DEBUG = originalEnv;
    });
  });

  describe("logging methods", () => {
    it("should log info messages", () => {
      const logger = new Logger();
      logger.info("Test info message");

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(consoleLogSpy.mock.calls[0][0]).toContain("INFO");
      expect(consoleLogSpy.mock.calls[0][0]).toContain("Test info message");
    });

    it("should route warnings and errors to their console methods", () => {
      const logger = new Logger();
      logger.warn("Test warning");
      logger.error("Test error");

      expect(consoleWarnSpy.mock.calls[0][0]).toContain("WARN");
      expect(consoleErrorSpy.mock.calls[0][0]).toContain("ERROR");
    });

    it("should log debug messages only in debug mode", () => {
      const logger = new Logger({ debug: false });
      logger.debug("Debug message");
      expect(consoleLogSpy).not.toHaveBeenCalled();

      const debugLogger = new Logger({ debug: true });
      debugLogger.debug("Debug message");
      expect(consoleLogSpy.mock.calls[0][0]).toContain("DEBUG");
    });

    it("should append data as JSON", () => {
      const logger = new Logger();
      logger.info("[Sync] Transfer completed", { files: 3 });

      expect(consoleLogSpy.mock.calls[0][0]).toContain('[Sync] Transfer completed {"files":3}');
    });

    it("should include the stack of a logged error", () => {
      const logger = new Logger();
      const error = new Error("rsync exploded");
      logger.error("Transfer failed", error);

      expect(consoleErrorSpy.mock.calls[0][0]).toContain("Error: rsync exploded");
    });
  });

  describe("quiet mode", () => {
    it("should keep the console silent", () => {
      const logger = new Logger({ quiet: true });
      logger.info("hidden");
      logger.error("hidden too");

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it("should be switchable through configure", () => {
      const logger = new Logger();
      logger.configure({ quiet: true });
      logger.info("hidden");

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });

    it("should turn on debug output through configure", () => {
      const logger = new Logger({ debug: false });
      logger.configure({ debug: true });
      logger.debug("now visible");

      expect(consoleLogSpy.mock.calls[0][0]).toContain("now visible");
    });
  });

  describe("file logging", () => {
    let logDir: string;

    beforeEach(async () => {
      logDir = await fs.mkdtemp(path.join(os.tmpdir(), "syncpair-logs-"));
    });

    afterEach(async () => {
      await fs.rm(logDir, { recursive: true, force: true });
    });

    it("should write queued entries as JSON lines on close", async () => {
      const logger = new Logger({ logToFile: true, quiet: true, logDir });
      await logger.init();
      logger.info("first", { step: 1 });
      logger.warn("second");
      await logger.close();

      const [file] = await fs.readdir(logDir);
      expect(file).toMatch(/^syncpair-\d{4}-\d{2}-\d{2}\.log$/);

      const lines = (await fs.readFile(path.join(logDir, file), "utf-8")).trim().split("\n");
      const entries = lines.map((line) => JSON.parse(line));
      expect(entries).toMatchObject([
        { level: "info", message: "first", data: { step: 1 } },
        { level: "warn", message: "second" },
      ]);
    });

    it("should not create a file when file logging is off", async () => {
      const logger = new Logger({ quiet: true, logDir });
      await logger.init();
      logger.info("nowhere");
      await logger.close();

      expect(await fs.readdir(logDir)).toEqual([]);
    });
  });

  describe("singleton functions", () => {
    it("should share one instance", () => {
      expect(getLogger()).toBe(getLogger());
    });
  });
});
