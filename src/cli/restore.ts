import ora from "ora";
import { log } from "../utils/logger.js";
import {
  buildBaseRestorePath,
  buildFullRestorePath,
  formatRestoreInfo,
} from "../core/restore-path.js";
import { runScript, type GlobalOptions } from "./context.js";

export interface RestoreOptions extends GlobalOptions {
  id?: string;
  /** Restore only this path from the snapshot. */
  path?: string;
  /** Base directory; defaults to RESTORE_TARGET_DIR. */
  target?: string;
}

export async function restoreCommand(opts: RestoreOptions): Promise<void> {
  await runScript("restore", opts, async ({ config, client, sink }) => {
    const snapshot = await client.getSnapshotInfo(opts.id ?? "latest");
    const baseDir = opts.target ?? config.restoreTargetDir;

    // restic recreates the full source path under --target, so the
    // timestamped directory is the target and the include picks the path
    const target = await buildBaseRestorePath(baseDir, snapshot.time);
    const destination = opts.path
      ? await buildFullRestorePath(baseDir, snapshot.time, opts.path)
      : target;

    log.header("Restore");
    for (const [key, value] of Object.entries(formatRestoreInfo(snapshot, destination, opts.path))) {
      log.kv(key, value);
    }
    log.blank();

    const spinner = ora(`Restoring snapshot ${snapshot.shortId}...`).start();
    try {
      await client.restore(target, {
        snapshotId: snapshot.id,
        include: opts.path ? [opts.path] : [],
      });
    } catch (err) {
      spinner.fail("Restore failed");
      throw err;
    }
    spinner.succeed(`Restored to ${destination}`);
    await sink.write(`Snapshot ${snapshot.shortId} restored to ${destination}`);
  });
}
