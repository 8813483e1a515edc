import ora from "ora";
import { log } from "../utils/logger.js";
import { runScript, type GlobalOptions } from "./context.js";

export interface ForgetOptions extends GlobalOptions {
  /** Commander's --no-prune sets this to false (default true) */
  prune?: boolean;
  /** Only consider snapshots with these tags; defaults to RESTIC_TAGS. */
  tag?: string[];
}

export async function forgetCommand(opts: ForgetOptions): Promise<void> {
  await runScript("forget", opts, async ({ config, client, sink }) => {
    const before = await client.listSnapshots();
    const prune = opts.prune !== false;
    const r = config.retention;

    const spinner = ora(prune ? "Applying retention policy and pruning..." : "Applying retention policy...").start();
    try {
      await client.applyRetentionPolicy(r, { prune, tags: opts.tag ?? config.tags });
    } catch (err) {
      spinner.fail("Failed to apply retention policy");
      throw err;
    }
    spinner.stop();

    const after = await client.listSnapshots();
    const removed = before.length - after.length;

    log.header("Retention applied");
    log.kv("Policy", `hourly ${r.keepHourly}, daily ${r.keepDaily}, weekly ${r.keepWeekly}, monthly ${r.keepMonthly}`);
    log.kv("Before", `${before.length} snapshots`);
    log.kv("After", `${after.length} snapshots`);
    log.kv("Removed", `${removed} snapshots`, removed > 0 ? "ok" : undefined);
    await sink.write(`Retention removed ${removed} snapshot(s)`);
  });
}
