import type { ChildProcess } from "node:child_process";
import { z } from "zod";
import { log } from "../utils/logger.js";
import type { StorageProvider, RetentionPolicy } from "./config.js";
import { ResticError, commandFailure, isResticError, validationError, describeError, type CommandResult } from "./errors.js";
import { redactCommand } from "./redact.js";
import { withRetry, type RetryHooks, type RetryPolicy } from "./retry.js";
import { runProcess, startProcess, stopProcess, type RunOptions } from "./process.js";
import type { LogSink } from "./log-sink.js";

// ─── Restic JSON output ─────────────────────────────────────────────────────

const SnapshotSchema = z.object({
  id: z.string(),
  short_id: z.string().optional(),
  time: z.string(),
  hostname: z.string().default(""),
  paths: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
});

const SnapshotListSchema = z.array(SnapshotSchema).nullable();

const StatsSchema = z.object({
  total_size: z.number(),
  total_file_count: z.number().default(0),
  snapshots_count: z.number().optional(),
});

export interface SnapshotDescriptor {
  id: string;
  shortId: string;
  /** As written by restic (local time with offset). */
  time: string;
  hostname: string;
  paths: string[];
  tags: string[];
}

export interface RepositoryStats {
  totalSize: number;
  totalFileCount: number;
  snapshotsCount?: number;
}

export type StatsMode = "raw-data" | "restore-size" | "blobs-per-file" | "files-by-contents";

export type RepairTarget = "snapshots" | "index" | "packs";

function toDescriptor(s: z.infer<typeof SnapshotSchema>): SnapshotDescriptor {
  return {
    id: s.id,
    shortId: s.short_id ?? s.id.slice(0, 8),
    time: s.time,
    hostname: s.hostname,
    paths: s.paths ?? [],
    tags: s.tags ?? [],
  };
}

// ─── Client ─────────────────────────────────────────────────────────────────

export type CommandExecutor = (
  file: string,
  args: readonly string[],
  opts: RunOptions,
) => Promise<CommandResult>;

export type ProcessStarter = typeof startProcess;

/** Where the client records each command it runs. */
export type CommandLog = Pick<LogSink, "write" | "command">;

export interface ResticClientOptions {
  /** Repository URL, see `getRepositoryUrl`. */
  repository: string;
  provider?: StorageProvider;
  /** Full environment for restic, including RESTIC_PASSWORD and provider credentials. */
  env: Record<string, string>;
  binary?: string;
  retry?: Partial<RetryPolicy>;
  retryHooks?: RetryHooks;
  logSink?: CommandLog;
  /** Default per-call timeout. */
  timeoutMs?: number;
  exec?: CommandExecutor;
  start?: ProcessStarter;
}

export interface CallOptions {
  timeoutMs?: number;
}

interface RunSpec extends CallOptions {
  retry: boolean;
}

export interface MountHandle {
  child: ChildProcess;
  /** Resolves with the exit code once restic exits. */
  exited: Promise<number>;
  stop(graceMs?: number): Promise<void>;
}

const SNAPSHOT_SAVED = /snapshot ([a-f0-9]+) saved/;
const LS_HEADER = /^snapshot [a-f0-9]+ of /;

/**
 * Runs restic subcommands against one repository. Failures surface as
 * {@link ResticError}; transient kinds are retried per the client's policy.
 */
export class ResticClient {
  readonly repository: string;
  readonly provider: StorageProvider | undefined;
  private readonly env: Record<string, string>;
  private readonly binary: string;
  private readonly retry: Partial<RetryPolicy>;
  private readonly retryHooks: RetryHooks;
  private readonly logSink: CommandLog | undefined;
  private readonly timeoutMs: number | undefined;
  private readonly exec: CommandExecutor;
  private readonly start: ProcessStarter;

  constructor(opts: ResticClientOptions) {
    this.repository = opts.repository;
    this.provider = opts.provider;
    this.env = { ...opts.env, RESTIC_REPOSITORY: opts.repository };
    this.binary = opts.binary ?? "restic";
    this.retry = opts.retry ?? {};
    this.retryHooks = opts.retryHooks ?? {};
    this.logSink = opts.logSink;
    this.timeoutMs = opts.timeoutMs;
    this.exec = opts.exec ?? runProcess;
    this.start = opts.start ?? startProcess;
  }

  // ─── Repository ───────────────────────────────────────────────────────

  /** True when `restic snapshots` succeeds, after retries. */
  async checkRepositoryAccess(): Promise<boolean> {
    log.info(`Checking access to repository ${this.repository}`);
    try {
      await this.run(["snapshots", "--json"], { retry: true });
      return true;
    } catch (err) {
      if (!isResticError(err)) throw err;
      log.debug(`Repository not accessible: ${describeError(err)}`);
      return false;
    }
  }

  async initRepository(): Promise<boolean> {
    log.info(`Initializing repository ${this.repository}`);
    return this.succeeds(["init"]);
  }

  /** `restic version` output, or null when restic can't be run. */
  async getVersion(): Promise<string | null> {
    try {
      const { stdout } = await this.run(["version"], { retry: false });
      return stdout.trim() || null;
    } catch (err) {
      if (!isResticError(err)) throw err;
      log.debug(`restic version failed: ${describeError(err)}`);
      return null;
    }
  }

  async supportsMount(): Promise<boolean> {
    try {
      const { stdout } = await this.run(["help"], { retry: false });
      return stdout.includes("mount");
    } catch (err) {
      if (!isResticError(err)) throw err;
      return false;
    }
  }

  async checkRepository(opts: CallOptions & { readDataSubset?: string } = {}): Promise<void> {
    const args = ["check"];
    if (opts.readDataSubset) args.push("--read-data-subset", opts.readDataSubset);
    log.info("Checking repository integrity");
    await this.run(args, { retry: true, timeoutMs: opts.timeoutMs });
  }

  async rebuildIndex(opts: { readAllPacks?: boolean } = {}): Promise<void> {
    const args = ["rebuild-index"];
    if (opts.readAllPacks) args.push("--read-all-packs");
    log.info("Rebuilding repository index");
    await this.run(args, { retry: false });
  }

  async repair(target: RepairTarget): Promise<void> {
    log.info(`Repairing ${target}`);
    await this.run(["repair", target], { retry: false });
  }

  // ─── Backup & retention ───────────────────────────────────────────────

  /**
   * Back up `paths` and return the new snapshot id.
   */
  async backup(
    paths: readonly string[],
    opts: CallOptions & { excludes?: readonly string[]; tags?: readonly string[] } = {},
  ): Promise<string> {
    if (paths.length === 0) {
      throw validationError("At least one path is required for backup");
    }

    const args = ["backup", ...paths];
    for (const pattern of cleanList(opts.excludes)) args.push("--exclude", pattern);
    for (const tag of cleanList(opts.tags)) args.push("--tag", tag);

    log.info(
      `Backing up ${paths.length} path(s) with ${cleanList(opts.excludes).length} exclude(s) and ${cleanList(opts.tags).length} tag(s)`,
    );
    const command = [this.binary, ...args];
    const result = await this.run(args, { retry: true, timeoutMs: opts.timeoutMs });

    const match = SNAPSHOT_SAVED.exec(result.stdout);
    if (!match) {
      throw new ResticError({
        kind: "command",
        message: "Could not find the snapshot id in restic backup output",
        command,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }
    log.debug(`Snapshot ${match[1]} saved`);
    return match[1];
  }

  async applyRetentionPolicy(
    policy: RetentionPolicy,
    opts: CallOptions & { prune?: boolean; tags?: readonly string[] } = {},
  ): Promise<void> {
    const keep: Array<[string, number]> = [
      ["--keep-hourly", policy.keepHourly],
      ["--keep-daily", policy.keepDaily],
      ["--keep-weekly", policy.keepWeekly],
      ["--keep-monthly", policy.keepMonthly],
    ];
    const args = ["forget"];
    for (const [flag, value] of keep) {
      if (!Number.isInteger(value) || value < 0) {
        throw validationError(`${flag} must be a whole number >= 0, got ${value}`);
      }
      args.push(flag, String(value));
    }
    for (const tag of cleanList(opts.tags)) args.push("--tag", tag);
    if (opts.prune) args.push("--prune");

    log.info("Applying retention policy");
    await this.run(args, { retry: true, timeoutMs: opts.timeoutMs });
  }

  async prune(opts: CallOptions = {}): Promise<void> {
    log.info("Pruning unreferenced data");
    await this.run(["prune"], { retry: true, timeoutMs: opts.timeoutMs });
  }

  // ─── Snapshots ────────────────────────────────────────────────────────

  async listSnapshots(): Promise<SnapshotDescriptor[]> {
    const command = ["snapshots", "--json"];
    const { stdout } = await this.run(command, { retry: true });
    const parsed = this.parseJson(SnapshotListSchema, stdout, command);
    return (parsed ?? []).map(toDescriptor);
  }

  async getSnapshotInfo(snapshotId = "latest"): Promise<SnapshotDescriptor> {
    const command = ["snapshots", snapshotId, "--json"];
    const { stdout } = await this.run(command, { retry: true });
    const parsed = this.parseJson(SnapshotListSchema, stdout, command);
    const first = parsed?.[0];
    if (!first) {
      throw new ResticError({
        kind: "command",
        message: `Snapshot ${snapshotId} not found`,
        command: [this.binary, ...command],
        stdout,
      });
    }
    return toDescriptor(first);
  }

  /** Paths contained in a snapshot, one per entry. */
  async listSnapshotFiles(snapshotId = "latest"): Promise<string[]> {
    const { stdout } = await this.run(["ls", snapshotId], { retry: true });
    return stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !LS_HEADER.test(line));
  }

  async restore(
    target: string,
    opts: CallOptions & { snapshotId?: string; include?: readonly string[] } = {},
  ): Promise<void> {
    const snapshotId = opts.snapshotId ?? "latest";
    const args = ["restore", snapshotId, "--target", target];
    for (const path of cleanList(opts.include)) args.push("--include", path);
    log.info(`Restoring snapshot ${snapshotId} to ${target}`);
    await this.run(args, { retry: true, timeoutMs: opts.timeoutMs });
  }

  async getRepositoryStats(
    opts: { mode?: StatsMode; snapshotId?: string } = {},
  ): Promise<RepositoryStats> {
    const command = ["stats"];
    if (opts.snapshotId) command.push(opts.snapshotId);
    command.push("--mode", opts.mode ?? "raw-data", "--json");

    const { stdout } = await this.run(command, { retry: true });
    const stats = this.parseJson(StatsSchema, stdout, command);
    return {
      totalSize: stats.total_size,
      totalFileCount: stats.total_file_count,
      ...(stats.snapshots_count === undefined ? {} : { snapshotsCount: stats.snapshots_count }),
    };
  }

  // ─── Mount ────────────────────────────────────────────────────────────

  /**
   * Start `restic mount` in the foreground. The caller owns the handle and
   * must stop it.
   */
  async mount(mountPoint: string, extraArgs: readonly string[] = []): Promise<MountHandle> {
    const args = ["mount", mountPoint, ...extraArgs];
    const line = redactCommand([this.binary, ...args]).join(" ");
    log.debug(`$ ${line}`);
    await this.logSink?.write(`Starting: ${line}`);

    const { child, exited } = this.start(this.binary, args, { env: this.env });
    return {
      child,
      exited,
      stop: (graceMs?: number) => stopProcess(child, graceMs),
    };
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private async succeeds(args: string[]): Promise<boolean> {
    try {
      await this.run(args, { retry: false });
      return true;
    } catch (err) {
      if (!isResticError(err)) throw err;
      log.error(describeError(err));
      return false;
    }
  }

  private run(args: string[], spec: RunSpec): Promise<CommandResult> {
    const command = [this.binary, ...args];
    const line = redactCommand(command).join(" ");
    const timeoutMs = spec.timeoutMs ?? this.timeoutMs;

    const once = async (): Promise<CommandResult> => {
      log.debug(`$ ${line}`);
      const started = Date.now();
      let result: CommandResult;
      try {
        result = await this.exec(this.binary, args, { env: this.env, timeoutMs });
      } catch (err) {
        await this.logSink?.write(`$ ${line}\n${describeError(err)}`);
        throw err;
      }
      await this.logSink?.command(line, result, Date.now() - started);
      if (result.exitCode !== 0) throw commandFailure(command, result);
      return result;
    };

    return spec.retry ? withRetry(once, this.retry, this.retryHooks) : once();
  }

  private parseJson<S extends z.ZodTypeAny>(schema: S, stdout: string, args: string[]): z.output<S> {
    const command = [this.binary, ...args];
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (err) {
      throw new ResticError({
        kind: "command",
        message: `restic ${args[0]} returned invalid JSON`,
        command,
        stdout,
        cause: err,
      });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new ResticError({
        kind: "command",
        message: `Unexpected restic ${args[0]} output: ${result.error.issues[0]?.message ?? "invalid"}`,
        command,
        stdout,
      });
    }
    return result.data;
  }
}

function cleanList(items: readonly string[] | undefined): string[] {
  return (items ?? []).map((item) => item.trim()).filter((item) => item.length > 0);
}
