import ora from "ora";
import { runScript, type GlobalOptions } from "./context.js";

export async function pruneCommand(opts: GlobalOptions): Promise<void> {
  await runScript("prune", opts, async ({ client, sink }) => {
    const spinner = ora("Pruning unreferenced data...").start();
    try {
      await client.prune();
    } catch (err) {
      spinner.fail("Prune failed");
      throw err;
    }
    spinner.succeed("Prune complete");
    await sink.write("Prune complete");
  });
}
