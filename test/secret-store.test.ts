import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";

// Mock child_process and platform before importing
const mockExecFile = vi.fn();
const mockExecFileAsync = vi.fn();

vi.mock("node:child_process", () => ({
  execFile: (...args: unknown[]) => mockExecFile(...args),
}));

vi.mock("node:util", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:util")>();
  return {
    ...actual,
    promisify: () => mockExecFileAsync,
  };
});

let mockPlatform = "linux";
let secretsFile = "";
vi.mock("../src/utils/platform.js", () => ({
  getPlatform: () => mockPlatform,
  getSecretsFilePath: () => secretsFile,
}));

vi.mock("../src/utils/logger.js", () => ({
  log: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    success: vi.fn(),
  },
}));

let tempDir: string;

function fakeChild(exitCode: number) {
  return {
    stdin: { write: vi.fn(), end: vi.fn() },
    on: vi.fn((event: string, cb: (code?: number) => void) => {
      if (event === "close") setTimeout(() => cb(exitCode), 0);
    }),
  };
}

describe("secret store", () => {
  beforeEach(async () => {
    vi.resetModules();
    mockExecFile.mockReset();
    mockExecFileAsync.mockReset();
    mockPlatform = "linux";
    tempDir = await mkdtemp(join(tmpdir(), "resticguard-secrets-"));
    secretsFile = join(tempDir, "app", "secrets.json");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("setSecret", () => {
    it("stores on macOS using the security CLI", async () => {
      mockPlatform = "darwin";
      mockExecFileAsync.mockResolvedValueOnce({});

      const { setSecret } = await import("../src/core/secret-store.js");
      expect(await setSecret("resticguard", "RESTIC_PASSWORD", "test-secret")).toBe(true);

      expect(mockExecFileAsync).toHaveBeenCalledWith("security", [
        "add-generic-password",
        "-s", "resticguard",
        "-a", "RESTIC_PASSWORD",
        "-w", "test-secret",
        "-U",
      ]);
    });

    it("stores on Linux using secret-tool with the value on stdin", async () => {
      const child = fakeChild(0);
      mockExecFile.mockReturnValue(child);

      const { setSecret } = await import("../src/core/secret-store.js");
      expect(await setSecret("prod", "AWS_SECRET_ACCESS_KEY", "test-secret")).toBe(true);

      expect(mockExecFile).toHaveBeenCalledWith("secret-tool", [
        "store",
        "--label", "prod AWS_SECRET_ACCESS_KEY",
        "service", "prod",
        "account", "AWS_SECRET_ACCESS_KEY",
      ]);
      expect(child.stdin.write).toHaveBeenCalledWith("test-secret");
      expect(child.stdin.end).toHaveBeenCalled();
    });

    it("falls back to a mode 600 file when secret-tool fails", async () => {
      mockExecFile.mockReturnValue(fakeChild(1));

      const { setSecret } = await import("../src/core/secret-store.js");
      expect(await setSecret("resticguard", "RESTIC_PASSWORD", "test-secret")).toBe(true);

      expect(JSON.parse(await readFile(secretsFile, "utf-8"))).toEqual({
        resticguard: { RESTIC_PASSWORD: "test-secret" },
      });
      expect((await stat(secretsFile)).mode & 0o777).toBe(0o600);
    });

    it("uses the file on platforms without a keychain", async () => {
      mockPlatform = "win32";

      const { setSecret } = await import("../src/core/secret-store.js");
      await setSecret("a", "K1", "v1");
      await setSecret("a", "K2", "v2");
      await setSecret("b", "K1", "v3");

      expect(JSON.parse(await readFile(secretsFile, "utf-8"))).toEqual({
        a: { K1: "v1", K2: "v2" },
        b: { K1: "v3" },
      });
      expect(mockExecFileAsync).not.toHaveBeenCalled();
    });
  });

  describe("getSecret", () => {
    it("reads from the macOS keychain", async () => {
      mockPlatform = "darwin";
      mockExecFileAsync.mockResolvedValueOnce({ stdout: "test-secret\n" });

      const { getSecret } = await import("../src/core/secret-store.js");
      expect(await getSecret("resticguard", "RESTIC_PASSWORD")).toBe("test-secret");

      expect(mockExecFileAsync).toHaveBeenCalledWith("security", [
        "find-generic-password",
        "-s", "resticguard",
        "-a", "RESTIC_PASSWORD",
        "-w",
      ]);
    });

    it("reads from the Linux keychain", async () => {
      mockExecFileAsync.mockResolvedValueOnce({ stdout: "linux-secret\n" });

      const { getSecret } = await import("../src/core/secret-store.js");
      expect(await getSecret("resticguard", "RESTIC_PASSWORD")).toBe("linux-secret");

      expect(mockExecFileAsync).toHaveBeenCalledWith("secret-tool", [
        "lookup",
        "service", "resticguard",
        "account", "RESTIC_PASSWORD",
      ]);
    });

    it("returns null when neither keychain nor file has the key", async () => {
      mockPlatform = "darwin";
      mockExecFileAsync.mockRejectedValueOnce(new Error("not found"));

      const { getSecret } = await import("../src/core/secret-store.js");
      expect(await getSecret("resticguard", "RESTIC_PASSWORD")).toBeNull();
    });

    it("falls back to the file when the keychain is empty", async () => {
      mockPlatform = "win32";
      const { setSecret } = await import("../src/core/secret-store.js");
      await setSecret("resticguard", "RESTIC_PASSWORD", "from-file");

      mockPlatform = "linux";
      mockExecFileAsync.mockResolvedValueOnce({ stdout: "  \n" });
      const { getSecret } = await import("../src/core/secret-store.js");
      expect(await getSecret("resticguard", "RESTIC_PASSWORD")).toBe("from-file");
    });
  });

  describe("deleteSecret", () => {
    it("deletes from the macOS keychain", async () => {
      mockPlatform = "darwin";
      mockExecFileAsync.mockResolvedValueOnce({});

      const { deleteSecret } = await import("../src/core/secret-store.js");
      expect(await deleteSecret("resticguard", "RESTIC_PASSWORD")).toBe(true);

      expect(mockExecFileAsync).toHaveBeenCalledWith("security", [
        "delete-generic-password",
        "-s", "resticguard",
        "-a", "RESTIC_PASSWORD",
      ]);
    });

    it("deletes from the Linux keychain", async () => {
      mockExecFileAsync.mockResolvedValueOnce({});

      const { deleteSecret } = await import("../src/core/secret-store.js");
      expect(await deleteSecret("resticguard", "RESTIC_PASSWORD")).toBe(true);

      expect(mockExecFileAsync).toHaveBeenCalledWith("secret-tool", [
        "clear",
        "service", "resticguard",
        "account", "RESTIC_PASSWORD",
      ]);
    });

    it("returns false when nothing was deleted", async () => {
      mockPlatform = "darwin";
      mockExecFileAsync.mockRejectedValueOnce(new Error("not found"));

      const { deleteSecret } = await import("../src/core/secret-store.js");
      expect(await deleteSecret("resticguard", "RESTIC_PASSWORD")).toBe(false);
    });

    it("removes the key from the fallback file", async () => {
      mockPlatform = "win32";
      const { setSecret, deleteSecret, getSecret } = await import("../src/core/secret-store.js");
      await setSecret("resticguard", "RESTIC_PASSWORD", "test-secret");

      expect(await deleteSecret("resticguard", "RESTIC_PASSWORD")).toBe(true);
      expect(await getSecret("resticguard", "RESTIC_PASSWORD")).toBeNull();
    });
  });

  describe("isSecretStoreAvailable", () => {
    it("returns true on macOS when security exists", async () => {
      mockPlatform = "darwin";
      mockExecFileAsync.mockResolvedValueOnce({});

      const { isSecretStoreAvailable } = await import("../src/core/secret-store.js");
      expect(await isSecretStoreAvailable()).toBe(true);
      expect(mockExecFileAsync).toHaveBeenCalledWith("security", ["help"]);
    });

    it("returns true on Linux when secret-tool exists", async () => {
      mockExecFileAsync.mockResolvedValueOnce({});

      const { isSecretStoreAvailable } = await import("../src/core/secret-store.js");
      expect(await isSecretStoreAvailable()).toBe(true);
      expect(mockExecFileAsync).toHaveBeenCalledWith("which", ["secret-tool"]);
    });

    it("returns false when the CLI is missing", async () => {
      mockExecFileAsync.mockRejectedValueOnce(new Error("not found"));

      const { isSecretStoreAvailable } = await import("../src/core/secret-store.js");
      expect(await isSecretStoreAvailable()).toBe(false);
    });

    it("returns false on unsupported platforms", async () => {
      mockPlatform = "win32";
      const { isSecretStoreAvailable } = await import("../src/core/secret-store.js");
      expect(await isSecretStoreAvailable()).toBe(false);
    });
  });
});
