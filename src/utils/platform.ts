import { homedir, platform } from "node:os";
import { join } from "node:path";

export type Platform = "darwin" | "linux" | "win32";

export function getPlatform(): Platform {
  const p = platform();
  if (p === "darwin" || p === "linux" || p === "win32") return p;
  throw new Error(`Unsupported platform: ${p}`);
}

export function getAppDir(): string {
  return join(homedir(), ".resticguard");
}

/** File used for secrets when no OS keychain is reachable. */
export function getSecretsFilePath(): string {
  return join(getAppDir(), "secrets.json");
}

