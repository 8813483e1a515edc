import { appendFile } from "node:fs/promises";
import { join } from "node:path";
import { Mutex } from "async-mutex";
import { ensureDir } from "../utils/fs.js";
import { redactSecrets } from "./redact.js";
import type { CommandResult } from "./errors.js";

const pad = (n: number) => String(n).padStart(2, "0");

/** `{logDir}/{prefix}_YYYYMMDD_HHMMSS.log`, local time. */
export function createLogFileName(prefix: string, logDir: string, now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return join(logDir, `${prefix}_${stamp}.log`);
}

export function formatLogLine(message: string, now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `[${stamp}] ${redactSecrets(message)}`;
}

/**
 * Append-only log file for one script run. Concurrent writers are
 * serialised so lines never interleave.
 */
export class LogSink {
  private readonly mutex = new Mutex();

  constructor(
    readonly path: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  static async open(prefix: string, logDir: string): Promise<LogSink> {
    await ensureDir(logDir);
    return new LogSink(createLogFileName(prefix, logDir));
  }

  async write(message: string): Promise<void> {
    const line = formatLogLine(message, this.clock()) + "\n";
    await this.mutex.runExclusive(() => appendFile(this.path, line, "utf-8"));
  }

  /** Record a finished command with its (redacted) output. */
  async command(commandLine: string, result: CommandResult, elapsedMs: number): Promise<void> {
    let entry =
      `$ ${commandLine}\n` +
      `exit code ${result.exitCode} after ${(elapsedMs / 1000).toFixed(2)}s`;
    if (result.stdout.trim()) entry += `\nstdout:\n${result.stdout.trimEnd()}`;
    if (result.stderr.trim()) entry += `\nstderr:\n${result.stderr.trimEnd()}`;
    await this.write(entry);
  }
}
