import ora from "ora";
import { log } from "../utils/logger.js";
import { runScript, type GlobalOptions } from "./context.js";

export interface FilesOptions extends GlobalOptions {
  id?: string;
}

export async function filesCommand(opts: FilesOptions): Promise<void> {
  await runScript("files", opts, async ({ client, sink }) => {
    const id = opts.id ?? "latest";
    const spinner = ora(`Listing files in ${id}...`).start();
    const files = await client.listSnapshotFiles(id);
    spinner.stop();

    log.header(`Files in ${id} (${files.length})`);
    for (const file of files) log.raw(`  ${file}`);
    await sink.write(`Listed ${files.length} file(s) in ${id}`);
  });
}
