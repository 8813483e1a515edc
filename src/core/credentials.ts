import { log } from "../utils/logger.js";
import { DEFAULT_APP_NAME, parseStorageProvider, type StorageProvider } from "./config.js";
import type { AppEnvironment } from "./env.js";
import { getSecret, setSecret } from "./secret-store.js";
import { getAwsSecret, getAzureSecret, getGcpSecret } from "./cloud-secrets.js";
import { decryptSopsFile } from "./sops.js";

export type CloudProvider = "aws" | "azure" | "gcp";

export type CredentialSource =
  | { kind: "env" }
  | { kind: "keyring" }
  | { kind: "cloud"; provider: CloudProvider }
  | { kind: "sops"; file?: string };

const SOURCE_NAMES: Record<string, CredentialSource> = {
  env: { kind: "env" },
  keyring: { kind: "keyring" },
  aws_secrets: { kind: "cloud", provider: "aws" },
  azure_keyvault: { kind: "cloud", provider: "azure" },
  gcp_secrets: { kind: "cloud", provider: "gcp" },
  sops: { kind: "sops" },
};

export const CREDENTIAL_SOURCE_NAMES = Object.keys(SOURCE_NAMES);

function assertNever(value: never): never {
  throw new Error(`Unhandled credential source: ${JSON.stringify(value)}`);
}

/**
 * Parse a `CREDENTIAL_SOURCE` value. Unknown names fall back to `env`.
 */
export function parseCredentialSource(value: string | undefined): CredentialSource {
  const name = (value ?? "env").trim().toLowerCase();
  const source = SOURCE_NAMES[name];
  if (source) return source;
  log.warn(
    `Unknown credential source "${value}", using env (expected one of: ${CREDENTIAL_SOURCE_NAMES.join(", ")})`,
  );
  return SOURCE_NAMES.env;
}

export function describeCredentialSource(source: CredentialSource): string {
  switch (source.kind) {
    case "env":
      return "environment";
    case "keyring":
      return "OS keychain";
    case "cloud":
      switch (source.provider) {
        case "aws":
          return "AWS Secrets Manager";
        case "azure":
          return "Azure Key Vault";
        case "gcp":
          return "GCP Secret Manager";
      }
      return assertNever(source.provider);
    case "sops":
      return source.file ? `sops (${source.file})` : "sops";
    default:
      return assertNever(source);
  }
}

const PROVIDER_KEYS: Record<StorageProvider, readonly string[]> = {
  aws: ["AWS_ACCESS_KEY_ID", "AWS_SECRET_ACCESS_KEY"],
  azure: ["AZURE_ACCOUNT_NAME", "AZURE_ACCOUNT_KEY"],
  gcp: ["GOOGLE_PROJECT_ID", "GOOGLE_APPLICATION_CREDENTIALS"],
};

/** Keys restic needs for `provider`, password first. */
export function requiredCredentialKeys(provider: string): string[] {
  return ["RESTIC_PASSWORD", ...PROVIDER_KEYS[parseStorageProvider(provider)]];
}

/** Provider credential keys only. */
export function providerCredentialKeys(provider: string): string[] {
  return [...PROVIDER_KEYS[parseStorageProvider(provider)]];
}

export type StoreResult = "stored" | "unsupported" | "failed";

export interface CredentialResolverOptions {
  env: AppEnvironment;
  /** Secret namespace for keyring and AWS lookups. */
  namespace?: string;
  /** Consult the environment when another source has no value. */
  fallbackToEnv?: boolean;
  sopsFile?: string;
}

/**
 * Looks up secrets from the configured source. Backend failures are logged
 * and treated as a missing value; nothing is cached beyond the `.env` file.
 */
export class CredentialResolver {
  readonly namespace: string;
  private readonly env: AppEnvironment;
  private readonly fallbackToEnv: boolean;
  private readonly sopsFile: string | undefined;

  constructor(opts: CredentialResolverOptions) {
    this.env = opts.env;
    this.namespace = opts.namespace || DEFAULT_APP_NAME;
    this.fallbackToEnv = opts.fallbackToEnv ?? true;
    this.sopsFile = opts.sopsFile;
  }

  get usesDefaultNamespace(): boolean {
    return this.namespace === DEFAULT_APP_NAME;
  }

  async resolve(key: string, source: CredentialSource): Promise<string | null> {
    let value: string | null = null;
    try {
      value = await this.fromSource(key, source);
    } catch (err) {
      log.error(
        `Could not read ${key} from ${describeCredentialSource(source)}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (value === null && this.fallbackToEnv && source.kind !== "env") {
      value = this.env.get(key) ?? null;
      if (value !== null) log.debug(`${key} taken from environment fallback`);
    }
    return value;
  }

  /** Resolve several keys; missing ones are left out. */
  async resolveAll(keys: readonly string[], source: CredentialSource): Promise<Record<string, string>> {
    const resolved: Record<string, string> = {};
    for (const key of keys) {
      const value = await this.resolve(key, source);
      if (value !== null) resolved[key] = value;
    }
    return resolved;
  }

  async store(key: string, value: string, source: CredentialSource): Promise<StoreResult> {
    switch (source.kind) {
      case "env":
        this.env.set(key, value);
        log.warn(`${key} set for this process only; add it to .env to persist it`);
        return "stored";
      case "keyring":
        return (await setSecret(this.namespace, key, value)) ? "stored" : "failed";
      case "cloud":
      case "sops":
        log.warn(`Storing credentials in ${describeCredentialSource(source)} is not supported`);
        return "unsupported";
      default:
        return assertNever(source);
    }
  }

  private async fromSource(key: string, source: CredentialSource): Promise<string | null> {
    switch (source.kind) {
      case "env":
        return this.env.get(key) ?? null;
      case "keyring":
        return getSecret(this.namespace, key);
      case "cloud":
        switch (source.provider) {
          case "aws":
            return getAwsSecret(key, { namespace: this.namespace, region: this.env.get("AWS_REGION") });
          case "azure":
            return getAzureSecret(key, { vaultUrl: this.env.get("AZURE_KEYVAULT_URL") });
          case "gcp":
            return getGcpSecret(key, { projectId: this.env.get("GCP_PROJECT_ID") });
        }
        return assertNever(source.provider);
      case "sops": {
        const values = await decryptSopsFile(source.file ?? this.sopsFile);
        return values?.[key] || null;
      }
      default:
        return assertNever(source);
    }
  }
}

/**
 * Reason a restic password is too weak, or null when it is acceptable.
 */
export function checkPasswordStrength(password: string): string | null {
  if (password.length < 12) return "must be at least 12 characters";
  if (!/[A-Z]/.test(password)) return "must contain an uppercase letter";
  if (!/[a-z]/.test(password)) return "must contain a lowercase letter";
  if (!/\d/.test(password)) return "must contain a digit";
  if (!/[^A-Za-z0-9]/.test(password)) return "must contain a symbol";
  return null;
}
