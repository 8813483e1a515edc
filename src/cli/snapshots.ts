import ora from "ora";
import chalk from "chalk";
import { log } from "../utils/logger.js";
import { formatBytes, formatTimeAgo } from "../utils/format.js";
import { formatSnapshotTimestamp } from "../core/restore-path.js";
import { runScript, type GlobalOptions } from "./context.js";

export interface SnapshotsOptions extends GlobalOptions {
  /** Also show each snapshot's restore size. */
  size?: boolean;
}

export async function snapshotsCommand(opts: SnapshotsOptions): Promise<void> {
  await runScript("snapshots", opts, async ({ client, sink }) => {
    const spinner = ora("Loading snapshots...").start();
    const snapshots = await client.listSnapshots();

    const sizes = new Map<string, number>();
    if (opts.size) {
      for (const snap of snapshots) {
        spinner.text = `Measuring ${snap.shortId}...`;
        const stats = await client.getRepositoryStats({ mode: "restore-size", snapshotId: snap.id });
        sizes.set(snap.id, stats.totalSize);
      }
    }
    spinner.stop();
    await sink.write(`Listed ${snapshots.length} snapshot(s)`);

    if (snapshots.length === 0) {
      log.info("No snapshots yet. Run `resticguard backup` to create one.");
      return;
    }

    log.header(`Snapshots (${snapshots.length})`);

    const sizeHeader = opts.size ? "Size       " : "";
    log.raw(chalk.dim(`  ID        Date                Host            ${sizeHeader}Paths`));
    log.raw(chalk.dim("  " + "-".repeat(opts.size ? 80 : 70)));

    for (const snap of snapshots) {
      const id = chalk.white(snap.shortId.padEnd(10));
      const date = formatSnapshotTimestamp(snap.time).padEnd(20);
      const host = snap.hostname.slice(0, 15).padEnd(16);
      const size = opts.size ? formatBytes(sizes.get(snap.id) ?? 0).padEnd(11) : "";
      const tags = snap.tags.length > 0 ? chalk.cyan(` [${snap.tags.join(", ")}]`) : "";
      log.raw(`  ${id}${date}${host}${size}${snap.paths.join(", ")}${tags}`);
    }

    const latest = snapshots[snapshots.length - 1];
    log.blank();
    log.info(chalk.dim(`Latest: ${latest.shortId} (${formatTimeAgo(new Date(latest.time))})`));
    log.info(chalk.dim(`Restore a snapshot: resticguard restore --id ${latest.shortId}`));
  });
}
