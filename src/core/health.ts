import { pathExists, ensureDir } from "../utils/fs.js";
import { buildResticEnv, getRepositoryUrl, type AppConfig } from "./config.js";
import {
  describeCredentialSource,
  providerCredentialKeys,
  type CredentialResolver,
  type CredentialSource,
} from "./credentials.js";
import { describeError } from "./errors.js";
import { ResticClient, type CommandExecutor } from "./restic.js";

export interface HealthCheck {
  name: string;
  status: "ok" | "warn" | "error";
  message: string;
}

export interface HealthCheckOptions {
  config: AppConfig;
  resolver: CredentialResolver;
  source: CredentialSource;
  /** Base environment handed to restic. */
  env: Record<string, string>;
  /** Also try to reach the repository. */
  remote?: boolean;
  exec?: CommandExecutor;
}

/**
 * 0 when everything passed, 1 for warnings only, 2 when anything failed.
 */
export function exitCodeFor(checks: readonly HealthCheck[]): 0 | 1 | 2 {
  if (checks.some((c) => c.status === "error")) return 2;
  if (checks.some((c) => c.status === "warn")) return 1;
  return 0;
}

/**
 * Run all configuration and environment checks and return results.
 */
export async function runHealthChecks(opts: HealthCheckOptions): Promise<HealthCheck[]> {
  const { config, resolver, source } = opts;
  const checks: HealthCheck[] = [];

  // 1. Storage
  let repository: string | null = null;
  if (!config.storageProvider || !config.storageBucket) {
    checks.push({
      name: "Storage",
      status: "error",
      message: "STORAGE_PROVIDER and STORAGE_BUCKET must be set",
    });
  } else {
    try {
      repository = getRepositoryUrl(config.storageProvider, config.storageBucket);
      checks.push({ name: "Storage", status: "ok", message: repository });
    } catch (err) {
      checks.push({ name: "Storage", status: "error", message: describeError(err) });
    }
  }

  // 2. Credentials
  const password = await resolver.resolve("RESTIC_PASSWORD", source);
  checks.push(
    password
      ? { name: "Restic password", status: "ok", message: `Found in ${describeCredentialSource(source)}` }
      : { name: "Restic password", status: "error", message: "RESTIC_PASSWORD not found" },
  );

  let credentials: Record<string, string> = {};
  if (repository && config.storageProvider) {
    const keys = providerCredentialKeys(config.storageProvider);
    credentials = await resolver.resolveAll(keys, source);
    const missing = keys.filter((k) => !(k in credentials));
    checks.push(
      missing.length === 0
        ? { name: "Provider credentials", status: "ok", message: keys.join(", ") }
        : { name: "Provider credentials", status: "error", message: `Missing: ${missing.join(", ")}` },
    );
  }

  if (source.kind === "keyring" && resolver.usesDefaultNamespace) {
    checks.push({
      name: "Secret namespace",
      status: "warn",
      message: `Using default namespace "${resolver.namespace}"; set APP_NAME to keep deployments apart`,
    });
  }

  // 3. Backup sources
  if (config.backupSourceDirs.length === 0) {
    checks.push({ name: "Backup sources", status: "error", message: "BACKUP_SOURCE_DIRS is empty" });
  } else {
    const missing: string[] = [];
    for (const dir of config.backupSourceDirs) {
      if (!(await pathExists(dir))) missing.push(dir);
    }
    checks.push(
      missing.length === 0
        ? { name: "Backup sources", status: "ok", message: `${config.backupSourceDirs.length} director(ies)` }
        : { name: "Backup sources", status: "warn", message: `Not found: ${missing.join(", ")}` },
    );
  }

  // 4. Log directory
  try {
    await ensureDir(config.logDir);
    checks.push({ name: "Log directory", status: "ok", message: config.logDir });
  } catch (err) {
    checks.push({ name: "Log directory", status: "error", message: describeError(err) });
  }

  // 5. Retention
  const r = config.retention;
  checks.push(
    config.retentionEnabled
      ? {
          name: "Retention",
          status: "ok",
          message: `hourly ${r.keepHourly}, daily ${r.keepDaily}, weekly ${r.keepWeekly}, monthly ${r.keepMonthly}`,
        }
      : { name: "Retention", status: "warn", message: "Disabled (RETENTION_ENABLED)" },
  );

  // 6. Restic binary
  const client = new ResticClient({
    repository: repository ?? "",
    env: buildResticEnv(opts.env, repository ?? "", password ?? "", credentials),
    binary: config.resticBinary,
    exec: opts.exec,
  });
  const version = await client.getVersion();
  checks.push(
    version
      ? { name: "Restic binary", status: "ok", message: version }
      : { name: "Restic binary", status: "error", message: `${config.resticBinary} not found or not runnable` },
  );

  // 7. Remote repository
  if (opts.remote) {
    if (repository && password && version) {
      const ok = await client.checkRepositoryAccess();
      checks.push(
        ok
          ? { name: "Remote repository", status: "ok", message: "Reachable" }
          : { name: "Remote repository", status: "error", message: "Cannot reach repository. Check credentials and network." },
      );
    } else {
      checks.push({
        name: "Remote repository",
        status: "warn",
        message: "Skipped (storage, password or restic missing)",
      });
    }
  }

  return checks;
}
