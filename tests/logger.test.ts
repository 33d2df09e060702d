import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  Logger,
  LogLevel,
  LogLevelNames,
  parseLogLevel,
  type LogContext,
} from "../src/logger.ts";

const originalConsoleLog = console.log;
const originalConsoleError = console.error;
let consoleOutput: string[] = [];
let errorOutput: string[] = [];

describe("Logger", () => {
  beforeEach(() => {
    consoleOutput = [];
    errorOutput = [];

    console.log = vi.fn().mockImplementation((message: string) => {
      consoleOutput.push(message);
    });
    console.error = vi.fn().mockImplementation((message: string) => {
      errorOutput.push(message);
    });
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    vi.clearAllMocks();
  });

  describe("LogLevel", () => {
    it("should order levels from TRACE to FATAL", () => {
      expect(LogLevel.TRACE).toBe(0);
      expect(LogLevel.INFO).toBe(2);
      expect(LogLevel.FATAL).toBe(5);
      expect(LogLevelNames[LogLevel.WARN]).toBe("WARN");
    });

    it("should parse level names case-insensitively", () => {
      expect(parseLogLevel("trace")).toBe(LogLevel.TRACE);
      expect(parseLogLevel("Warn")).toBe(LogLevel.WARN);
      expect(parseLogLevel("nonsense")).toBe(LogLevel.INFO);
      expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    });
  });

  describe("Log Level Filtering", () => {
    it("should respect log level threshold", () => {
      const testLogger = new Logger({ level: LogLevel.WARN });

      testLogger.trace("trace message");
      testLogger.debug("debug message");
      testLogger.info("info message");
      testLogger.warn("warn message");
      testLogger.error("error message");
      testLogger.fatal("fatal message");

      // WARN goes to stdout, ERROR and FATAL go to stderr
      expect(consoleOutput).toHaveLength(1);
      expect(errorOutput).toHaveLength(2);
      expect(consoleOutput[0]).toContain("WARN");
      expect(errorOutput[0]).toContain("ERROR");
      expect(errorOutput[1]).toContain("FATAL");
    });

    it("should lower the level to DEBUG in verbose mode", () => {
      const testLogger = new Logger({ level: LogLevel.INFO, verbose: true });

      testLogger.debug("debug message");

      expect(consoleOutput).toHaveLength(1);
    });

    it("should raise the level to WARN in quiet mode", () => {
      const testLogger = new Logger({ level: LogLevel.DEBUG, verbose: true, quiet: true });

      testLogger.info("hidden");
      testLogger.warn("shown");

      expect(consoleOutput).toHaveLength(1);
      expect(testLogger.getState()).toEqual({
        level: LogLevel.WARN,
        verbose: false,
        quiet: true,
        silent: false,
      });
    });

    it("should respect silent mode", () => {
      const testLogger = new Logger({ silent: true });

      testLogger.error("silent error");

      expect(errorOutput).toHaveLength(0);
    });
  });

  describe("Output Formats", () => {
    it("should format human-readable output", () => {
      const testLogger = new Logger({ colorize: false, timestamp: false });

      testLogger.info("test message");

      expect(consoleOutput[0]).toBe("INFO  test message");
    });

    it("should include component and context in human output", () => {
      const testLogger = new Logger({
        colorize: false,
        timestamp: false,
        component: "pipeline",
      });

      testLogger.warn("careful", { slug: "screen" });

      expect(consoleOutput[0]).toBe('WARN  [pipeline] careful {"slug":"screen"}');
    });

    it("should format JSON output", () => {
      const testLogger = new Logger({ outputFormat: "json", component: "cli" });
      const context: LogContext = { operation: "write", filePath: "/tmp/a.css" };

      testLogger.info("json message", context);

      const entry = JSON.parse(consoleOutput[0]);
      expect(entry.level).toBe("INFO");
      expect(entry.message).toBe("json message");
      expect(entry.component).toBe("cli");
      expect(entry.context).toEqual(context);
      expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it("should log Error objects with their code", () => {
      const testLogger = new Logger({ outputFormat: "json" });
      const error = Object.assign(new Error("no such file"), { code: "ENOENT" });

      testLogger.error(error);

      const entry = JSON.parse(errorOutput[0]);
      expect(entry.message).toBe("no such file");
      expect(entry.error.name).toBe("Error");
      expect(entry.error.code).toBe("ENOENT");
    });
  });

  describe("File operations", () => {
    it("should trace file operations with size", () => {
      const testLogger = new Logger({
        level: LogLevel.TRACE,
        colorize: false,
        timestamp: false,
      });

      testLogger.fileOperation("write", "/out/screen.css", { size: 15 });

      expect(consoleOutput[0]).toBe(
        'TRACE write: /out/screen.css (15 bytes) {"operation":"write","filePath":"/out/screen.css","fileSize":15}',
      );
    });

    it("should report operation timings at DEBUG", () => {
      const testLogger = new Logger({
        level: LogLevel.DEBUG,
        colorize: false,
        timestamp: false,
      });

      testLogger.timing("compile", 12, { compiler: "less" });

      expect(consoleOutput[0]).toBe(
        'DEBUG Operation "compile" completed in 12ms {"compiler":"less","operation":"compile","processingTime":12}',
      );
    });

    it("should stay quiet about file operations above TRACE", () => {
      const testLogger = new Logger({ level: LogLevel.DEBUG });

      testLogger.fileOperation("remove", "/out/screen.css");

      expect(consoleOutput).toHaveLength(0);
    });
  });

  describe("Child Loggers", () => {
    it("should inherit settings and set the component", () => {
      const parent = new Logger({ level: LogLevel.DEBUG, outputFormat: "json" });

      parent.child("catalog").debug("child message");

      const entry = JSON.parse(consoleOutput[0]);
      expect(entry.level).toBe("DEBUG");
      expect(entry.component).toBe("catalog");
    });
  });
});
