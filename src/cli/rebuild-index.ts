import ora from "ora";
import { runScript, type GlobalOptions } from "./context.js";

export interface RebuildIndexOptions extends GlobalOptions {
  readAllPacks?: boolean;
}

export async function rebuildIndexCommand(opts: RebuildIndexOptions): Promise<void> {
  await runScript("rebuild_index", opts, async ({ client, sink }) => {
    const spinner = ora("Rebuilding index...").start();
    try {
      await client.rebuildIndex({ readAllPacks: opts.readAllPacks });
    } catch (err) {
      spinner.fail("Index rebuild failed");
      throw err;
    }
    spinner.succeed("Index rebuilt");
    await sink.write("Index rebuilt");
  });
}
