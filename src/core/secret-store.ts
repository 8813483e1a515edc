import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { readFile, writeFile, chmod } from "node:fs/promises";
import { dirname } from "node:path";
import { getPlatform, getSecretsFilePath } from "../utils/platform.js";
import { ensureDir } from "../utils/fs.js";
import { log } from "../utils/logger.js";

const execFileAsync = promisify(execFile);

type SecretFile = Record<string, Record<string, string>>;

// ─── File-based fallback (permissions 0600) ──────────────────────────────────

async function readSecretFile(): Promise<SecretFile> {
  let raw: string;
  try {
    raw = await readFile(getSecretsFilePath(), "utf-8");
  } catch {
    return {};
  }

  const parsed: unknown = JSON.parse(raw);
  const result: SecretFile = {};
  if (typeof parsed !== "object" || parsed === null) return result;

  for (const [ns, entries] of Object.entries(parsed)) {
    if (typeof entries !== "object" || entries === null) continue;
    const bucket: Record<string, string> = {};
    for (const [key, value] of Object.entries(entries)) {
      if (typeof value === "string") bucket[key] = value;
    }
    result[ns] = bucket;
  }
  return result;
}

async function writeSecretFile(data: SecretFile): Promise<void> {
  const filePath = getSecretsFilePath();
  await ensureDir(dirname(filePath));
  await writeFile(filePath, JSON.stringify(data, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
  await chmod(filePath, 0o600);
}

async function saveSecretToFile(namespace: string, key: string, value: string): Promise<boolean> {
  try {
    const data = await readSecretFile();
    data[namespace] = { ...data[namespace], [key]: value };
    await writeSecretFile(data);
    log.debug(`Secret ${namespace}/${key} saved to ${getSecretsFilePath()} (mode 600)`);
    return true;
  } catch (err) {
    log.debug(`Failed to save secret to file: ${err}`);
    return false;
  }
}

async function readSecretFromFile(namespace: string, key: string): Promise<string | null> {
  try {
    const data = await readSecretFile();
    return data[namespace]?.[key] || null;
  } catch (err) {
    log.debug(`Failed to read ${getSecretsFilePath()}: ${err}`);
    return null;
  }
}

async function deleteSecretFromFile(namespace: string, key: string): Promise<boolean> {
  try {
    const data = await readSecretFile();
    const bucket = data[namespace];
    if (!bucket || !(key in bucket)) return false;
    delete bucket[key];
    await writeSecretFile(data);
    return true;
  } catch (err) {
    log.debug(`Failed to delete secret from file: ${err}`);
    return false;
  }
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Store a secret under `namespace`/`key` in the system keychain.
 * Falls back to ~/.resticguard/secrets.json (mode 600) if the keychain is unavailable.
 *
 * - macOS: Keychain Access via `security` CLI
 * - Linux: GNOME Keyring / KDE Wallet via `secret-tool` CLI
 */
export async function setSecret(namespace: string, key: string, value: string): Promise<boolean> {
  const platform = getPlatform();

  try {
    if (platform === "darwin") {
      await execFileAsync("security", [
        "add-generic-password",
        "-s", namespace,
        "-a", key,
        "-w", value,
        "-U", // Update if exists
      ]);
      return true;
    }

    if (platform === "linux") {
      const child = execFile("secret-tool", [
        "store",
        "--label", `${namespace} ${key}`,
        "service", namespace,
        "account", key,
      ]);

      // secret-tool reads the secret from stdin
      child.stdin?.write(value);
      child.stdin?.end();

      await new Promise<void>((resolve, reject) => {
        child.on("close", (code) => {
          if (code === 0) resolve();
          else reject(new Error(`secret-tool exited with code ${code}`));
        });
        child.on("error", reject);
      });
      return true;
    }

    log.debug(`Keychain not supported on ${platform}, using file fallback`);
    return saveSecretToFile(namespace, key, value);
  } catch (err) {
    log.debug(`Keychain store failed: ${err}, using file fallback`);
    return saveSecretToFile(namespace, key, value);
  }
}

/**
 * Retrieve a secret from the system keychain, then the fallback file.
 */
export async function getSecret(namespace: string, key: string): Promise<string | null> {
  const platform = getPlatform();

  try {
    if (platform === "darwin") {
      const { stdout } = await execFileAsync("security", [
        "find-generic-password",
        "-s", namespace,
        "-a", key,
        "-w", // Output password only
      ]);
      const value = stdout.trim();
      if (value) return value;
    }

    if (platform === "linux") {
      const { stdout } = await execFileAsync("secret-tool", [
        "lookup",
        "service", namespace,
        "account", key,
      ]);
      const value = stdout.trim();
      if (value) return value;
    }
  } catch (err) {
    log.debug(`Keychain lookup for ${namespace}/${key} failed: ${err}`);
  }

  return readSecretFromFile(namespace, key);
}

/**
 * Delete a secret from the system keychain and the fallback file.
 */
export async function deleteSecret(namespace: string, key: string): Promise<boolean> {
  const platform = getPlatform();
  let deleted = false;

  try {
    if (platform === "darwin") {
      await execFileAsync("security", [
        "delete-generic-password",
        "-s", namespace,
        "-a", key,
      ]);
      deleted = true;
    }

    if (platform === "linux") {
      await execFileAsync("secret-tool", [
        "clear",
        "service", namespace,
        "account", key,
      ]);
      deleted = true;
    }
  } catch (err) {
    log.debug(`Keychain delete for ${namespace}/${key} failed: ${err}`);
  }

  const fileDeleted = await deleteSecretFromFile(namespace, key);
  return deleted || fileDeleted;
}

/**
 * Check if an OS keychain is available on this system.
 */
export async function isSecretStoreAvailable(): Promise<boolean> {
  const platform = getPlatform();

  try {
    if (platform === "darwin") {
      await execFileAsync("security", ["help"]);
      return true;
    }

    if (platform === "linux") {
      await execFileAsync("which", ["secret-tool"]);
      return true;
    }

    return false;
  } catch {
    return false;
  }
}
