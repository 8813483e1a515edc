import ora from "ora";
import { validationError } from "../core/errors.js";
import type { RepairTarget } from "../core/restic.js";
import { runScript, type GlobalOptions } from "./context.js";

const TARGETS: readonly RepairTarget[] = ["snapshots", "index", "packs"];

export function parseRepairTarget(value: string): RepairTarget {
  const target = TARGETS.find((t) => t === value);
  if (!target) throw validationError(`Unknown repair target "${value}" (expected ${TARGETS.join(", ")})`);
  return target;
}

export async function repairCommand(what: string, opts: GlobalOptions): Promise<void> {
  await runScript("repair", opts, async ({ client, sink }) => {
    const target = parseRepairTarget(what);
    const spinner = ora(`Repairing ${target}...`).start();
    try {
      await client.repair(target);
    } catch (err) {
      spinner.fail(`Repair of ${target} failed`);
      throw err;
    }
    spinner.succeed(`Repaired ${target}`);
    await sink.write(`Repaired ${target}`);
  });
}
