#!/usr/bin/env node
import { createRequire } from "node:module";
import { Command } from "commander";
import { setLogLevel } from "../utils/logger.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const program = new Command();

program
  .name("resticguard")
  .description("Restic backups to AWS, Azure and GCP with managed credentials")
  .version(version)
  .option("--verbose", "Enable debug logging")
  .option("--env-file <path>", "Read configuration from this .env file")
  .hook("preAction", (cmd) => {
    const opts = cmd.optsWithGlobals();
    if (opts.verbose) setLogLevel("debug");
  });

program
  .command("backup")
  .description("Back up BACKUP_SOURCE_DIRS and apply the retention policy")
  .option("--no-retention", "Skip the retention policy after the backup")
  .action(async (opts, cmd: Command) => {
    const { backupCommand } = await import("./backup.js");
    await backupCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("restore")
  .description("Restore a snapshot into a timestamped directory")
  .option("--id <snapshot>", "Snapshot id (default: latest)")
  .option("--path <path>", "Restore only this path from the snapshot")
  .option("--target <dir>", "Base directory (default: RESTORE_TARGET_DIR)")
  .action(async (opts, cmd: Command) => {
    const { restoreCommand } = await import("./restore.js");
    await restoreCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("snapshots")
  .description("List snapshots")
  .option("--size", "Show the restore size of each snapshot")
  .action(async (opts, cmd: Command) => {
    const { snapshotsCommand } = await import("./snapshots.js");
    await snapshotsCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("files")
  .description("List the files in a snapshot")
  .option("--id <snapshot>", "Snapshot id (default: latest)")
  .action(async (opts, cmd: Command) => {
    const { filesCommand } = await import("./files.js");
    await filesCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("forget")
  .description("Apply the retention policy")
  .option("--no-prune", "Only forget snapshots, keep their data")
  .option("--tag <tag...>", "Only consider snapshots with these tags")
  .action(async (opts, cmd: Command) => {
    const { forgetCommand } = await import("./forget.js");
    await forgetCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("prune")
  .description("Remove data no snapshot references")
  .action(async (_opts, cmd: Command) => {
    const { pruneCommand } = await import("./prune.js");
    await pruneCommand(cmd.optsWithGlobals());
  });

program
  .command("stats")
  .description("Show repository statistics")
  .option("--mode <mode>", "raw-data, restore-size, blobs-per-file or files-by-contents")
  .option("--id <snapshot>", "Limit to one snapshot")
  .action(async (opts, cmd: Command) => {
    const { statsCommand } = await import("./stats.js");
    await statsCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("check")
  .description("Verify repository integrity")
  .option("--read-data-subset <subset>", 'Also read part of the data, e.g. "10%"')
  .action(async (opts, cmd: Command) => {
    const { checkCommand } = await import("./check.js");
    await checkCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("init")
  .description("Initialize the repository if it does not exist")
  .action(async (_opts, cmd: Command) => {
    const { initCommand } = await import("./init.js");
    await initCommand(cmd.optsWithGlobals());
  });

program
  .command("rebuild-index")
  .description("Rebuild the repository index")
  .option("--read-all-packs", "Read every pack file")
  .action(async (opts, cmd: Command) => {
    const { rebuildIndexCommand } = await import("./rebuild-index.js");
    await rebuildIndexCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program
  .command("repair")
  .description("Repair snapshots, index or packs")
  .argument("<what>", "snapshots, index or packs")
  .action(async (what: string, _opts, cmd: Command) => {
    const { repairCommand } = await import("./repair.js");
    await repairCommand(what, cmd.optsWithGlobals());
  });

program
  .command("mount")
  .description("Mount the repository (Ctrl+C to unmount)")
  .option("--mount-point <dir>", "Directory to mount on (default: MOUNT_POINT)")
  .action(async (opts, cmd: Command) => {
    const { mountCommand } = await import("./mount.js");
    await mountCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

const credentialsCmd = program
  .command("credentials")
  .description("Manage restic and provider credentials");

credentialsCmd
  .command("setup")
  .description("Store credentials interactively")
  .option("--source <source>", "keyring or env")
  .option("--restic-only", "Only set RESTIC_PASSWORD")
  .action(async (opts, cmd: Command) => {
    const { credentialsSetupCommand } = await import("./credentials.js");
    await credentialsSetupCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

credentialsCmd
  .command("check")
  .description("Report which credentials can be resolved")
  .action(async (_opts, cmd: Command) => {
    const { credentialsCheckCommand } = await import("./credentials.js");
    await credentialsCheckCommand(cmd.optsWithGlobals());
  });

program
  .command("validate")
  .description("Validate configuration (exit 0 valid, 1 warnings, 2 errors)")
  .option("--remote", "Also check that the repository is reachable")
  .action(async (opts, cmd: Command) => {
    const { validateCommand } = await import("./validate.js");
    await validateCommand({ ...cmd.optsWithGlobals(), ...opts });
  });

program.parse();
