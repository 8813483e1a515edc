import ora from "ora";
import { log } from "../utils/logger.js";
import { formatBytes } from "../utils/format.js";
import { validationError } from "../core/errors.js";
import type { StatsMode } from "../core/restic.js";
import { runScript, type GlobalOptions } from "./context.js";

const MODES: readonly StatsMode[] = ["raw-data", "restore-size", "blobs-per-file", "files-by-contents"];

export interface StatsOptions extends GlobalOptions {
  mode?: string;
  id?: string;
}

function parseMode(value: string | undefined): StatsMode {
  if (value === undefined) return "raw-data";
  const mode = MODES.find((m) => m === value);
  if (!mode) throw validationError(`Unknown stats mode "${value}" (expected ${MODES.join(", ")})`);
  return mode;
}

export async function statsCommand(opts: StatsOptions): Promise<void> {
  await runScript("stats", opts, async ({ client, sink }) => {
    const mode = parseMode(opts.mode);
    const spinner = ora("Reading repository stats...").start();
    const stats = await client.getRepositoryStats({ mode, snapshotId: opts.id });
    spinner.stop();

    log.header(`Repository stats (${mode})`);
    log.kv("Repository", client.repository);
    if (opts.id) log.kv("Snapshot", opts.id);
    log.kv("Total size", formatBytes(stats.totalSize));
    log.kv("Files", String(stats.totalFileCount));
    if (stats.snapshotsCount !== undefined) log.kv("Snapshots", String(stats.snapshotsCount));
    await sink.write(`Stats (${mode}): ${stats.totalSize} bytes, ${stats.totalFileCount} files`);
  });
}
