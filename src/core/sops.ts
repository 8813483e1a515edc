import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { parse } from "dotenv";
import { pathExists } from "../utils/fs.js";
import { log } from "../utils/logger.js";

const execFileAsync = promisify(execFile);

/**
 * Decrypt a sops-encrypted dotenv file and return its variables.
 * Returns null when no file is configured or it does not exist.
 */
export async function decryptSopsFile(file: string | undefined): Promise<Record<string, string> | null> {
  if (!file) {
    log.error("SOPS_FILE is not set");
    return null;
  }
  if (!(await pathExists(file))) {
    log.error(`SOPS file not found: ${file}`);
    return null;
  }

  log.debug(`Decrypting ${file} with sops`);
  const { stdout } = await execFileAsync("sops", ["-d", file], {
    timeout: 30_000,
    maxBuffer: 10 * 1024 * 1024,
  });
  return parse(stdout);
}
