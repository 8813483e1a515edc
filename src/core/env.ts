import { readFile, writeFile } from "node:fs/promises";
import { config as loadDotenv } from "dotenv";
import { pathExists } from "../utils/fs.js";
import { log } from "../utils/logger.js";
import { validationError } from "./errors.js";

export interface AppEnvironmentOptions {
  /** `.env` file to merge in. Defaults to `.env` in the working directory. */
  envFile?: string;
  /** Base variables. Defaults to a copy of `process.env`. */
  source?: NodeJS.ProcessEnv;
}

/**
 * Snapshot of the process environment plus an optional `.env` file.
 * The file is read at most once and never overrides variables already set.
 */
export class AppEnvironment {
  private readonly values: Record<string, string> = {};
  private readonly envFile: string | undefined;
  private loaded = false;

  constructor(opts: AppEnvironmentOptions = {}) {
    this.envFile = opts.envFile;
    for (const [key, value] of Object.entries(opts.source ?? process.env)) {
      if (value !== undefined) this.values[key] = value;
    }
  }

  load(): this {
    if (this.loaded) return this;
    this.loaded = true;

    const result = loadDotenv({
      path: this.envFile,
      processEnv: this.values,
      override: false,
    });
    if (result.error) {
      // A missing default .env is normal; a missing explicit one is not
      if (this.envFile) log.warn(`Could not read env file ${this.envFile}: ${result.error.message}`);
      else log.debug("No .env file found, using process environment only");
    }
    return this;
  }

  /** Value for `key`; empty strings count as unset. */
  get(key: string): string | undefined {
    this.load();
    const value = this.values[key];
    return value === undefined || value === "" ? undefined : value;
  }

  set(key: string, value: string): void {
    this.load();
    this.values[key] = value;
  }

  /** Copy of every variable, for handing to a child process. */
  snapshot(): Record<string, string> {
    this.load();
    return { ...this.values };
  }
}

// dotenv keeps single- and backtick-quoted values literally
function quote(value: string): string {
  for (const q of ["'", "`", '"']) {
    if (!value.includes(q)) return `${q}${value}${q}`;
  }
  throw validationError("Value contains every dotenv quote character and cannot be written");
}

/**
 * Set `key` in a dotenv file, replacing an existing assignment or
 * appending one. The file is created (mode 600) if missing.
 */
export async function writeEnvValue(file: string, key: string, value: string): Promise<void> {
  let lines: string[] = [];
  if (await pathExists(file)) {
    lines = (await readFile(file, "utf-8")).split("\n");
    if (lines[lines.length - 1] === "") lines.pop();
  }

  const entry = `${key}=${quote(value)}`;
  const index = lines.findIndex((line) => line.trim().startsWith(`${key}=`));
  if (index >= 0) lines[index] = entry;
  else lines.push(entry);

  await writeFile(file, lines.join("\n") + "\n", { encoding: "utf-8", mode: 0o600 });
}
