import ora from "ora";
import { log } from "../utils/logger.js";
import { formatDuration } from "../utils/format.js";
import { describeError, validationError } from "../core/errors.js";
import { runScript, type GlobalOptions } from "./context.js";

export interface BackupOptions extends GlobalOptions {
  /** Commander's --no-retention sets this to false (default true) */
  retention?: boolean;
}

export async function backupCommand(opts: BackupOptions): Promise<void> {
  await runScript("backup", opts, async ({ config, client, sink }) => {
    const paths = config.backupSourceDirs;
    if (paths.length === 0) {
      throw validationError("BACKUP_SOURCE_DIRS is empty");
    }

    const started = Date.now();
    const spinner = ora(`Backing up ${paths.length} path(s)...`).start();
    let snapshotId: string;
    try {
      snapshotId = await client.backup(paths, { excludes: config.excludes, tags: config.tags });
    } catch (err) {
      spinner.fail("Backup failed");
      throw err;
    }
    spinner.stop();

    log.header("Backup complete");
    log.kv("Snapshot", snapshotId, "ok");
    log.kv("Paths", paths.join(", "));
    log.kv("Duration", formatDuration((Date.now() - started) / 1000));
    await sink.write(`Snapshot ${snapshotId} saved`);

    if (opts.retention === false || !config.retentionEnabled) {
      log.debug("Retention skipped");
      return;
    }

    const forgetSpinner = ora("Applying retention policy...").start();
    try {
      await client.applyRetentionPolicy(config.retention, { prune: true, tags: config.tags });
      forgetSpinner.succeed("Retention policy applied");
    } catch (err) {
      forgetSpinner.warn("Retention policy failed (backup was successful)");
      log.warn(describeError(err));
      await sink.write(`Retention failed: ${describeError(err)}`);
    }
  });
}
