import { z } from "zod";
import { validationError } from "./errors.js";
import type { AppEnvironment } from "./env.js";

export type StorageProvider = "aws" | "azure" | "gcp";

export const STORAGE_PROVIDERS: readonly StorageProvider[] = ["aws", "azure", "gcp"];

export interface RetentionPolicy {
  keepHourly: number;
  keepDaily: number;
  keepWeekly: number;
  keepMonthly: number;
}

export const DEFAULT_RETENTION: RetentionPolicy = {
  keepHourly: 0,
  keepDaily: 7,
  keepWeekly: 4,
  keepMonthly: 6,
};

export const DEFAULT_APP_NAME = "resticguard";

export function parseStorageProvider(value: string): StorageProvider {
  const normalized = value.trim().toLowerCase();
  const match = STORAGE_PROVIDERS.find((p) => p === normalized);
  if (!match) {
    throw validationError(
      `Unsupported storage provider: "${value}" (expected ${STORAGE_PROVIDERS.join(", ")})`,
    );
  }
  return match;
}

/**
 * Build the restic repository URL for a provider and bucket.
 *
 * - aws:   s3:s3.amazonaws.com/{bucket}
 * - azure: azure:{bucket}:restic
 * - gcp:   gs:{bucket}
 */
export function getRepositoryUrl(provider: string, bucket: string): string {
  const p = parseStorageProvider(provider);
  if (!bucket.trim()) {
    throw validationError(`Storage bucket must not be empty (provider "${provider}")`);
  }

  switch (p) {
    case "aws":
      return `s3:s3.amazonaws.com/${bucket}`;
    case "azure":
      return `azure:${bucket}:restic`;
    case "gcp":
      return `gs:${bucket}`;
  }
}

// ─── Environment-backed configuration ───────────────────────────────────────

/** Split a `;`-separated list, dropping blanks. */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(";")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const count = (fallback: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, "must be a whole number >= 0")
    .transform(Number)
    .optional()
    .transform((v) => v ?? fallback);

const flag = z
  .string()
  .optional()
  .transform((v) => v === undefined || ["true", "1", "yes"].includes(v.trim().toLowerCase()));

const ConfigSchema = z.object({
  STORAGE_PROVIDER: z.string().trim().toLowerCase().optional(),
  STORAGE_BUCKET: z.string().trim().optional(),
  CREDENTIAL_SOURCE: z.string().trim().optional().default("env"),
  BACKUP_SOURCE_DIRS: z.string().optional().transform(splitList),
  RESTIC_EXCLUDES: z.string().optional().transform(splitList),
  RESTIC_TAGS: z.string().optional().transform(splitList),
  RETENTION_ENABLED: flag,
  KEEP_HOURLY: count(DEFAULT_RETENTION.keepHourly),
  KEEP_DAILY: count(DEFAULT_RETENTION.keepDaily),
  KEEP_WEEKLY: count(DEFAULT_RETENTION.keepWeekly),
  KEEP_MONTHLY: count(DEFAULT_RETENTION.keepMonthly),
  LOG_DIR: z.string().optional().default("logs"),
  RESTORE_TARGET_DIR: z.string().optional().default("restore"),
  MOUNT_POINT: z.string().optional().default("./mount"),
  APP_NAME: z.string().trim().optional().default(DEFAULT_APP_NAME),
  SOPS_FILE: z.string().optional(),
  RESTIC_BINARY: z.string().optional().default("restic"),
  AZURE_KEYVAULT_URL: z.string().url().optional(),
  GCP_PROJECT_ID: z.string().optional(),
  AWS_REGION: z.string().optional(),
});

export interface AppConfig {
  storageProvider?: string;
  storageBucket?: string;
  credentialSource: string;
  backupSourceDirs: string[];
  excludes: string[];
  tags: string[];
  retentionEnabled: boolean;
  retention: RetentionPolicy;
  logDir: string;
  restoreTargetDir: string;
  mountPoint: string;
  appName: string;
  sopsFile?: string;
  resticBinary: string;
  azureKeyVaultUrl?: string;
  gcpProjectId?: string;
  awsRegion?: string;
}

/**
 * Read and validate configuration from the environment.
 * Throws a validation error listing every problem found.
 */
export function loadConfig(env: AppEnvironment): AppConfig {
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(ConfigSchema.shape)) {
    raw[key] = env.get(key);
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw validationError(`Invalid configuration: ${issues.join("; ")}`);
  }

  const c = result.data;
  return {
    storageProvider: c.STORAGE_PROVIDER,
    storageBucket: c.STORAGE_BUCKET,
    credentialSource: c.CREDENTIAL_SOURCE,
    backupSourceDirs: c.BACKUP_SOURCE_DIRS,
    excludes: c.RESTIC_EXCLUDES,
    tags: c.RESTIC_TAGS,
    retentionEnabled: c.RETENTION_ENABLED,
    retention: {
      keepHourly: c.KEEP_HOURLY,
      keepDaily: c.KEEP_DAILY,
      keepWeekly: c.KEEP_WEEKLY,
      keepMonthly: c.KEEP_MONTHLY,
    },
    logDir: c.LOG_DIR,
    restoreTargetDir: c.RESTORE_TARGET_DIR,
    mountPoint: c.MOUNT_POINT,
    appName: c.APP_NAME,
    sopsFile: c.SOPS_FILE,
    resticBinary: c.RESTIC_BINARY,
    azureKeyVaultUrl: c.AZURE_KEYVAULT_URL,
    gcpProjectId: c.GCP_PROJECT_ID,
    awsRegion: c.AWS_REGION,
  };
}

/**
 * Build environment variables for a restic child process.
 */
export function buildResticEnv(
  base: Record<string, string>,
  repository: string,
  password: string,
  credentials: Record<string, string> = {},
): Record<string, string> {
  return {
    ...base,
    ...credentials,
    RESTIC_REPOSITORY: repository,
    RESTIC_PASSWORD: password,
  };
}
