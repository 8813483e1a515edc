import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";

vi.mock("../src/utils/logger.js", () => ({
  log: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), success: vi.fn() },
}));

import { exitCodeFor, runHealthChecks, type HealthCheck } from "../src/core/health.js";
import { AppEnvironment } from "../src/core/env.js";
import { loadConfig } from "../src/core/config.js";
import { CredentialResolver, type CredentialSource } from "../src/core/credentials.js";
import type { CommandExecutor } from "../src/core/restic.js";

let tempDir: string;

const VERSION = "restic 0.16.4 compiled with go1.21.6 on linux/amd64";

function setup(values: Record<string, string>, source: CredentialSource = { kind: "env" }) {
  const env = new AppEnvironment({ source: values, envFile: join(tempDir, "none.env") });
  return {
    config: loadConfig(env),
    resolver: new CredentialResolver({ env, namespace: env.get("APP_NAME") }),
    source,
    env: {},
  };
}

function complete(): Record<string, string> {
  return {
    STORAGE_PROVIDER: "aws",
    STORAGE_BUCKET: "test-bucket",
    RESTIC_PASSWORD: "test-password",
    AWS_ACCESS_KEY_ID: "test-key-id",
    AWS_SECRET_ACCESS_KEY: "test-secret",
    BACKUP_SOURCE_DIRS: tempDir,
    LOG_DIR: join(tempDir, "logs"),
  };
}

const byName = (checks: HealthCheck[], name: string) => checks.find((c) => c.name === name);

describe("exitCodeFor", () => {
  const check = (status: HealthCheck["status"]): HealthCheck => ({ name: "x", status, message: "" });

  it("maps results to exit codes", () => {
    expect(exitCodeFor([check("ok"), check("ok")])).toBe(0);
    expect(exitCodeFor([check("ok"), check("warn")])).toBe(1);
    expect(exitCodeFor([check("warn"), check("error")])).toBe(2);
    expect(exitCodeFor([])).toBe(0);
  });
});

describe("runHealthChecks", () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "resticguard-health-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("passes with a complete configuration", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 0, stdout: `${VERSION}\n`, stderr: "" });

    const checks = await runHealthChecks({ ...setup(complete()), exec });

    expect(checks.map((c) => [c.name, c.status])).toEqual([
      ["Storage", "ok"],
      ["Restic password", "ok"],
      ["Provider credentials", "ok"],
      ["Backup sources", "ok"],
      ["Log directory", "ok"],
      ["Retention", "ok"],
      ["Restic binary", "ok"],
    ]);
    expect(byName(checks, "Storage")?.message).toBe("s3:s3.amazonaws.com/test-bucket");
    expect(byName(checks, "Restic binary")?.message).toBe(VERSION);
    expect(byName(checks, "Retention")?.message).toBe("hourly 0, daily 7, weekly 4, monthly 6");
    expect((await stat(join(tempDir, "logs"))).isDirectory()).toBe(true);
    expect(exitCodeFor(checks)).toBe(0);
  });

  it("reports missing storage and password as errors", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 0, stdout: VERSION, stderr: "" });
    const values = complete();
    delete values.STORAGE_BUCKET;
    delete values.RESTIC_PASSWORD;

    const checks = await runHealthChecks({ ...setup(values), exec });

    expect(byName(checks, "Storage")).toEqual({
      name: "Storage",
      status: "error",
      message: "STORAGE_PROVIDER and STORAGE_BUCKET must be set",
    });
    expect(byName(checks, "Restic password")?.status).toBe("error");
    expect(byName(checks, "Provider credentials")).toBeUndefined();
    expect(exitCodeFor(checks)).toBe(2);
  });

  it("lists missing provider keys", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 0, stdout: VERSION, stderr: "" });
    const values = complete();
    delete values.AWS_SECRET_ACCESS_KEY;

    const checks = await runHealthChecks({ ...setup(values), exec });

    expect(byName(checks, "Provider credentials")?.message).toBe("Missing: AWS_SECRET_ACCESS_KEY");
  });

  it("warns about missing source directories and disabled retention", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 0, stdout: VERSION, stderr: "" });
    const missing = join(tempDir, "does-not-exist");
    const values = { ...complete(), BACKUP_SOURCE_DIRS: `${tempDir};${missing}`, RETENTION_ENABLED: "false" };

    const checks = await runHealthChecks({ ...setup(values), exec });

    expect(byName(checks, "Backup sources")).toEqual({
      name: "Backup sources",
      status: "warn",
      message: `Not found: ${missing}`,
    });
    expect(byName(checks, "Retention")?.status).toBe("warn");
    expect(exitCodeFor(checks)).toBe(1);
  });

  it("warns when the keyring uses the default namespace", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 0, stdout: VERSION, stderr: "" });
    const resolver = setup(complete()).resolver;
    vi.spyOn(resolver, "resolve").mockResolvedValue("value");
    vi.spyOn(resolver, "resolveAll").mockResolvedValue({
      AWS_ACCESS_KEY_ID: "test-key-id",
      AWS_SECRET_ACCESS_KEY: "test-secret",
    });

    const checks = await runHealthChecks({ ...setup(complete()), resolver, source: { kind: "keyring" }, exec });

    expect(byName(checks, "Secret namespace")?.status).toBe("warn");
  });

  it("reports an unusable restic binary", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 127, stdout: "", stderr: "not found" });

    const checks = await runHealthChecks({ ...setup({ ...complete(), RESTIC_BINARY: "/opt/restic" }), exec });

    expect(byName(checks, "Restic binary")).toEqual({
      name: "Restic binary",
      status: "error",
      message: "/opt/restic not found or not runnable",
    });
  });

  it("checks the remote repository when asked", async () => {
    const exec = vi
      .fn<CommandExecutor>()
      .mockResolvedValueOnce({ exitCode: 0, stdout: VERSION, stderr: "" })
      .mockResolvedValueOnce({ exitCode: 0, stdout: "[]", stderr: "" });

    const checks = await runHealthChecks({ ...setup(complete()), exec, remote: true });

    expect(byName(checks, "Remote repository")).toEqual({
      name: "Remote repository",
      status: "ok",
      message: "Reachable",
    });
    expect(exec.mock.calls[1]?.[1]).toEqual(["snapshots", "--json"]);
    expect(exec.mock.calls[1]?.[2].env).toMatchObject({
      RESTIC_REPOSITORY: "s3:s3.amazonaws.com/test-bucket",
      RESTIC_PASSWORD: "test-password",
      AWS_SECRET_ACCESS_KEY: "test-secret",
    });
  });

  it("skips the remote check when restic is missing", async () => {
    const exec = vi.fn<CommandExecutor>().mockResolvedValue({ exitCode: 127, stdout: "", stderr: "" });

    const checks = await runHealthChecks({ ...setup(complete()), exec, remote: true });

    expect(byName(checks, "Remote repository")?.status).toBe("warn");
    expect(exec).toHaveBeenCalledTimes(1);
  });
});
