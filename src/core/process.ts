import { spawn, type ChildProcess } from "node:child_process";
import { ResticError, type CommandResult } from "./errors.js";

export interface RunOptions {
  env?: Record<string, string>;
  /** Kill the child after this long. No limit when unset. */
  timeoutMs?: number;
  /** Time between SIGTERM and SIGKILL once a timeout fires. */
  killGraceMs?: number;
}

export const DEFAULT_KILL_GRACE_MS = 5_000;

/**
 * Signal `child` with SIGTERM, then SIGKILL if it has not exited after
 * `graceMs`. Resolves once the child is gone.
 */
export function stopProcess(child: ChildProcess, graceMs: number = DEFAULT_KILL_GRACE_MS): Promise<void> {
  if (child.exitCode !== null || child.signalCode !== null) return Promise.resolve();

  return new Promise((resolve) => {
    const timer = setTimeout(() => child.kill("SIGKILL"), graceMs);
    child.once("exit", () => {
      clearTimeout(timer);
      resolve();
    });
    child.kill("SIGTERM");
  });
}

function spawnError(file: string, args: readonly string[], err: Error): ResticError {
  return new ResticError({
    kind: "command",
    message: `Failed to start ${file}: ${err.message}`,
    command: [file, ...args],
    cause: err,
  });
}

/**
 * Run a command to completion and collect its output. A non-zero exit is
 * returned, not thrown; failing to start or timing out throws.
 */
export function runProcess(
  file: string,
  args: readonly string[],
  opts: RunOptions = {},
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(file, args, {
      env: opts.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    child.stdout?.setEncoding("utf-8").on("data", (chunk: string) => (stdout += chunk));
    child.stderr?.setEncoding("utf-8").on("data", (chunk: string) => (stderr += chunk));

    const timer =
      opts.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            void stopProcess(child, opts.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
          }, opts.timeoutMs);

    child.on("error", (err) => {
      clearTimeout(timer);
      reject(spawnError(file, args, err));
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(
          new ResticError({
            kind: "timeout",
            message: `${file} ${args[0] ?? ""} did not finish within ${opts.timeoutMs}ms`.trim(),
            command: [file, ...args],
            stdout,
            stderr,
          }),
        );
        return;
      }
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });
  });
}

/**
 * Start a long-running command with inherited stdio, e.g. `restic mount`.
 */
export function startProcess(
  file: string,
  args: readonly string[],
  opts: Pick<RunOptions, "env"> = {},
): { child: ChildProcess; exited: Promise<number> } {
  const child = spawn(file, args, { env: opts.env, stdio: "inherit" });
  const exited = new Promise<number>((resolve, reject) => {
    child.once("error", (err) => reject(spawnError(file, args, err)));
    child.once("exit", (code) => resolve(code ?? -1));
  });
  return { child, exited };
}
