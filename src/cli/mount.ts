import { resolve } from "node:path";
import { log } from "../utils/logger.js";
import { ensureDir } from "../utils/fs.js";
import { getPlatform } from "../utils/platform.js";
import { ResticError } from "../core/errors.js";
import { runScript, type GlobalOptions } from "./context.js";

export const MOUNT_STOP_GRACE_MS = 10_000;

export interface MountOptions extends GlobalOptions {
  /** Defaults to MOUNT_POINT. */
  mountPoint?: string;
}

export async function mountCommand(opts: MountOptions): Promise<void> {
  await runScript("mount", opts, async ({ config, client, sink }) => {
    if (!(await client.supportsMount())) {
      const hint = getPlatform() === "win32" ? " (install WinFsp)" : " (install FUSE)";
      throw new ResticError({ kind: "command", message: `This restic build cannot mount repositories${hint}` });
    }

    const mountPoint = resolve(opts.mountPoint ?? config.mountPoint);
    await ensureDir(mountPoint);

    const handle = await client.mount(mountPoint);
    log.success(`Repository mounted at ${mountPoint}`);
    log.info("Press Ctrl+C to unmount.");

    const stop = () => {
      log.info("Unmounting...");
      void handle.stop(MOUNT_STOP_GRACE_MS);
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    try {
      const code = await handle.exited;
      await sink.write(`Mount exited with code ${code}`);
      // restic exits 130 when interrupted
      if (code !== 0 && code !== 130 && handle.child.signalCode === null) {
        throw new ResticError({ kind: "command", message: "restic mount failed", exitCode: code });
      }
    } finally {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
    log.success("Repository unmounted");
  });
}
