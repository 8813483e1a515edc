import { log } from "../utils/logger.js";
import { ResticError } from "../core/errors.js";
import { runScript, type GlobalOptions } from "./context.js";

export async function initCommand(opts: GlobalOptions): Promise<void> {
  await runScript("init", opts, async ({ client, sink }) => {
    if (await client.checkRepositoryAccess()) {
      log.success(`Repository already initialized: ${client.repository}`);
      return;
    }

    if (!(await client.initRepository())) {
      throw new ResticError({ kind: "repository", message: `Could not initialize ${client.repository}` });
    }
    log.success(`Repository initialized: ${client.repository}`);
    await sink.write("Repository initialized");
  });
}
