import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { log, setLogLevel } from "../src/utils/logger.js";

describe("logger", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("info");
  });

  afterEach(() => {
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  describe("log level filtering", () => {
    it("hides debug messages at info level", () => {
      log.debug("debug message");
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("shows debug messages at debug level", () => {
      setLogLevel("debug");
      log.debug("debug message");
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it("hides info and warn messages at error level", () => {
      setLogLevel("error");
      log.info("hidden");
      log.warn("hidden");
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("shows error messages at error level", () => {
      setLogLevel("error");
      log.error("visible");
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("redaction", () => {
    it("redacts assignments in info messages", () => {
      log.info("using RESTIC_PASSWORD=test-secret");
      expect(String(errorSpy.mock.calls[0][0])).toContain("RESTIC_PASSWORD=***");
      expect(String(errorSpy.mock.calls[0][0])).not.toContain("test-secret");
    });

    it("redacts password flags in debug messages", () => {
      setLogLevel("debug");
      log.debug("restic --password test-secret snapshots");
      expect(String(errorSpy.mock.calls[0][0])).toContain("--password *** snapshots");
    });

    it("redacts raw output", () => {
      log.raw("AWS_SECRET_ACCESS_KEY=test-secret");
      expect(logSpy).toHaveBeenCalledWith("AWS_SECRET_ACCESS_KEY=***");
    });

    it("redacts kv values", () => {
      log.kv("Env", "AZURE_ACCOUNT_KEY=test-secret");
      expect(String(errorSpy.mock.calls[0][0])).toContain("AZURE_ACCOUNT_KEY=***");
    });
  });

  describe("log methods", () => {
    it("raw uses console.log", () => {
      log.raw("raw output");
      expect(logSpy).toHaveBeenCalledWith("raw output");
    });

    it("blank outputs empty line to stderr", () => {
      log.blank();
      expect(errorSpy).toHaveBeenCalledWith("");
    });

    it("kv accepts status parameter", () => {
      log.kv("Status", "OK", "ok");
      log.kv("Status", "Warning", "warn");
      log.kv("Status", "Error", "error");
      expect(errorSpy).toHaveBeenCalledTimes(3);
    });
  });
});
