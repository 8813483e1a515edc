// Public API for programmatic usage
export { redactSecrets, redactCommand, REDACTED } from "./core/redact.js";

export {
  ResticError,
  isResticError,
  classifyFailure,
  commandFailure,
  validationError,
  describeError,
  type ErrorKind,
  type FailureKind,
  type CommandResult,
} from "./core/errors.js";

export {
  withRetry,
  computeBackoff,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryHooks,
} from "./core/retry.js";

export { AppEnvironment, writeEnvValue, type AppEnvironmentOptions } from "./core/env.js";

export {
  CredentialResolver,
  parseCredentialSource,
  describeCredentialSource,
  requiredCredentialKeys,
  providerCredentialKeys,
  checkPasswordStrength,
  type CredentialSource,
  type CredentialResolverOptions,
  type StoreResult,
} from "./core/credentials.js";

export {
  getSecret,
  setSecret,
  deleteSecret,
  isSecretStoreAvailable,
} from "./core/secret-store.js";

export {
  getRepositoryUrl,
  parseStorageProvider,
  loadConfig,
  buildResticEnv,
  splitList,
  DEFAULT_RETENTION,
  type AppConfig,
  type RetentionPolicy,
  type StorageProvider,
} from "./core/config.js";

export {
  ResticClient,
  type ResticClientOptions,
  type SnapshotDescriptor,
  type RepositoryStats,
  type MountHandle,
  type CommandExecutor,
  type StatsMode,
  type RepairTarget,
} from "./core/restic.js";

export { runProcess, startProcess, stopProcess, type RunOptions } from "./core/process.js";

export {
  formatSnapshotTimestamp,
  normalizeOriginalPath,
  buildBaseRestorePath,
  buildFullRestorePath,
  formatRestoreInfo,
} from "./core/restore-path.js";

export { LogSink, createLogFileName, formatLogLine } from "./core/log-sink.js";

export { runHealthChecks, exitCodeFor, type HealthCheck } from "./core/health.js";
