import chalk from "chalk";
import { log } from "../utils/logger.js";
import { runHealthChecks, exitCodeFor, type HealthCheck } from "../core/health.js";
import { exitWithError, openBaseContext, type GlobalOptions } from "./context.js";

export interface ValidateOptions extends GlobalOptions {
  /** Also check that the repository is reachable. */
  remote?: boolean;
}

export async function validateCommand(opts: ValidateOptions): Promise<void> {
  let checks: HealthCheck[];
  try {
    const ctx = openBaseContext(opts);
    log.header("resticguard validate");
    checks = await runHealthChecks({
      config: ctx.config,
      resolver: ctx.resolver,
      source: ctx.source,
      env: ctx.env.snapshot(),
      remote: opts.remote,
    });
  } catch (err) {
    exitWithError(err, 2);
  }

  for (const check of checks) {
    const icon = statusIcon(check.status);
    const label = check.name.padEnd(22);
    const message = statusColor(check.status, check.message);
    log.raw(`  ${icon} ${label}${message}`);
  }

  log.blank();

  const errors = checks.filter((c) => c.status === "error");
  const warnings = checks.filter((c) => c.status === "warn");

  if (errors.length === 0 && warnings.length === 0) {
    log.success("Configuration is valid.");
  } else {
    if (errors.length > 0) {
      log.error(`${errors.length} error${errors.length > 1 ? "s" : ""} found.`);
    }
    if (warnings.length > 0) {
      log.warn(`${warnings.length} warning${warnings.length > 1 ? "s" : ""}.`);
    }
  }

  process.exit(exitCodeFor(checks));
}

function statusIcon(status: HealthCheck["status"]): string {
  switch (status) {
    case "ok":
      return chalk.green("OK");
    case "warn":
      return chalk.yellow("!!");
    case "error":
      return chalk.red("XX");
  }
}

function statusColor(status: HealthCheck["status"], message: string): string {
  switch (status) {
    case "ok":
      return chalk.green(message);
    case "warn":
      return chalk.yellow(message);
    case "error":
      return chalk.red(message);
  }
}
