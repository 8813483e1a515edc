import { describe, it, expect } from "vitest";
import {
  ResticError,
  classifyFailure,
  commandFailure,
  describeError,
  isResticError,
  validationError,
} from "../src/core/errors.js";

describe("classifyFailure", () => {
  it.each([
    ["Fatal: unable to open config file: dial tcp 52.0.0.1:443: i/o timeout", "network"],
    ["connection reset by peer", "network"],
    ["Fatal: repository not found", "repository"],
    ["pack abc is corrupted", "repository"],
    ["Fatal: wrong password or no key found", "authentication"],
    ["AccessDenied: access denied", "authentication"],
    ["open /data/file: permission denied", "permission"],
    ["operation not permitted", "permission"],
    ["Fatal: unknown flag --frobnicate", "command"],
  ])("classifies %s as %s", (stderr, kind) => {
    expect(classifyFailure("", stderr)).toBe(kind);
  });

  it("checks network markers before repository markers", () => {
    expect(classifyFailure("", "repository not found: connection refused")).toBe("network");
  });

  it("checks authentication markers before permission markers", () => {
    expect(classifyFailure("", "access denied: permission missing")).toBe("authentication");
  });

  it("looks at stdout as well as stderr", () => {
    expect(classifyFailure("Fatal: wrong password", "")).toBe("authentication");
  });

  it("is case-insensitive", () => {
    expect(classifyFailure("", "CONNECTION REFUSED")).toBe("network");
  });
});

describe("commandFailure", () => {
  it("builds a typed error with redacted command and raw output", () => {
    const err = commandFailure(["restic", "--password", "test-secret", "snapshots"], {
      exitCode: 1,
      stdout: "",
      stderr: "dial tcp: lookup failed",
    });

    expect(err).toBeInstanceOf(ResticError);
    expect(err.kind).toBe("network");
    expect(err.message).toBe("Network error while accessing the repository");
    expect(err.command).toEqual(["restic", "--password", "***", "snapshots"]);
    expect(err.exitCode).toBe(1);
    expect(err.stderr).toBe("dial tcp: lookup failed");
    expect(err.toString()).toBe("Network error while accessing the repository (exit code: 1)");
  });

  it("includes the exit code in the message for unclassified failures", () => {
    const err = commandFailure(["restic", "check"], { exitCode: 3, stdout: "", stderr: "boom" });
    expect(err.kind).toBe("command");
    expect(err.message).toBe("Restic command failed with code 3");
  });
});

describe("describeError", () => {
  it("adds a hint for authentication failures", () => {
    const err = new ResticError({ kind: "authentication", message: "Authentication failed", exitCode: 1 });
    expect(describeError(err)).toBe(
      "Authentication failed (exit code: 1). Check RESTIC_PASSWORD and provider credentials.",
    );
  });

  it("prefixes validation errors", () => {
    expect(describeError(validationError("bucket is empty"))).toBe("Invalid input: bucket is empty");
  });

  it("prefixes timeouts", () => {
    const err = new ResticError({ kind: "timeout", message: "restic backup did not finish within 10ms" });
    expect(describeError(err)).toBe("Timed out: restic backup did not finish within 10ms");
  });

  it("describes plain errors and thrown values", () => {
    expect(describeError(new Error("plain"))).toBe("plain");
    expect(describeError("text")).toBe("text");
  });
});

describe("isResticError", () => {
  it("narrows ResticError instances only", () => {
    expect(isResticError(validationError("x"))).toBe(true);
    expect(isResticError(new Error("x"))).toBe(false);
    expect(isResticError(null)).toBe(false);
  });
});
