import { log } from "../utils/logger.js";

// SDKs are loaded on first use so commands that never touch a cloud
// secret manager don't pay for them.

/**
 * Pick `field` out of a JSON object payload. Payloads that are not JSON
 * objects are returned as is; an object without the field yields null.
 */
export function extractSecretField(payload: string, field: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return payload;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return payload;
  }

  const value: unknown = Object.entries(parsed).find(([name]) => name === field)?.[1];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

// ─── AWS Secrets Manager ────────────────────────────────────────────────────

export interface AwsSecretOptions {
  namespace: string;
  region?: string;
}

/**
 * Read `{namespace}/{key}` from AWS Secrets Manager.
 */
export async function getAwsSecret(key: string, opts: AwsSecretOptions): Promise<string | null> {
  const { SecretsManagerClient, GetSecretValueCommand } = await import(
    "@aws-sdk/client-secrets-manager"
  );

  const client = new SecretsManagerClient(opts.region ? { region: opts.region } : {});
  const secretId = `${opts.namespace}/${key}`;
  log.debug(`Fetching ${secretId} from AWS Secrets Manager`);

  const response = await client.send(new GetSecretValueCommand({ SecretId: secretId }));
  if (response.SecretString !== undefined) {
    return extractSecretField(response.SecretString, key);
  }
  if (response.SecretBinary !== undefined) {
    return extractSecretField(Buffer.from(response.SecretBinary).toString("utf-8"), key);
  }
  return null;
}

// ─── Azure Key Vault ────────────────────────────────────────────────────────

export interface AzureSecretOptions {
  vaultUrl?: string;
}

/** Key Vault names allow only letters, digits and dashes. */
export function toAzureSecretName(key: string): string {
  return key.replace(/_/g, "-");
}

export async function getAzureSecret(key: string, opts: AzureSecretOptions): Promise<string | null> {
  if (!opts.vaultUrl) {
    log.error("AZURE_KEYVAULT_URL is not set");
    return null;
  }

  const [{ SecretClient }, { DefaultAzureCredential }] = await Promise.all([
    import("@azure/keyvault-secrets"),
    import("@azure/identity"),
  ]);

  const client = new SecretClient(opts.vaultUrl, new DefaultAzureCredential());
  const name = toAzureSecretName(key);
  log.debug(`Fetching ${name} from Azure Key Vault`);

  const secret = await client.getSecret(name);
  return secret.value ?? null;
}

// ─── GCP Secret Manager ─────────────────────────────────────────────────────

export interface GcpSecretOptions {
  projectId?: string;
}

export async function getGcpSecret(key: string, opts: GcpSecretOptions): Promise<string | null> {
  if (!opts.projectId) {
    log.error("GCP_PROJECT_ID is not set");
    return null;
  }

  const { SecretManagerServiceClient } = await import("@google-cloud/secret-manager");
  const client = new SecretManagerServiceClient();
  const name = `projects/${opts.projectId}/secrets/${key}/versions/latest`;
  log.debug(`Fetching ${name} from GCP Secret Manager`);

  const [version] = await client.accessSecretVersion({ name });
  const data = version.payload?.data;
  if (data === null || data === undefined) return null;
  return typeof data === "string" ? data : Buffer.from(data).toString("utf-8");
}
