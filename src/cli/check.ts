import ora from "ora";
import { runScript, type GlobalOptions } from "./context.js";

export interface CheckOptions extends GlobalOptions {
  /** e.g. "10%" or "1/5" */
  readDataSubset?: string;
}

export async function checkCommand(opts: CheckOptions): Promise<void> {
  await runScript("check", opts, async ({ client, sink }) => {
    const spinner = ora("Checking repository...").start();
    try {
      await client.checkRepository({ readDataSubset: opts.readDataSubset });
    } catch (err) {
      spinner.fail("Repository check failed");
      throw err;
    }
    spinner.succeed("Repository is healthy");
    await sink.write("Repository check passed");
  });
}
