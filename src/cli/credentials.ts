import prompts from "prompts";
import chalk from "chalk";
import { log } from "../utils/logger.js";
import { writeEnvValue } from "../core/env.js";
import {
  checkPasswordStrength,
  describeCredentialSource,
  parseCredentialSource,
  requiredCredentialKeys,
  type CredentialSource,
} from "../core/credentials.js";
import { validationError } from "../core/errors.js";
import { isSecretStoreAvailable } from "../core/secret-store.js";
import { exitWithError, openBaseContext, type BaseContext, type GlobalOptions } from "./context.js";

export interface CredentialsSetupOptions extends GlobalOptions {
  /** keyring or env */
  source?: string;
  resticOnly?: boolean;
}

const SECRET_KEY = /PASSWORD|SECRET|KEY/;

function keysFor(ctx: BaseContext, resticOnly: boolean | undefined): string[] {
  if (resticOnly) return ["RESTIC_PASSWORD"];
  if (!ctx.config.storageProvider) {
    log.warn("STORAGE_PROVIDER is not set, configuring RESTIC_PASSWORD only");
    return ["RESTIC_PASSWORD"];
  }
  return requiredCredentialKeys(ctx.config.storageProvider);
}

async function chooseSource(flag: string | undefined): Promise<CredentialSource | null> {
  if (flag) {
    const source = parseCredentialSource(flag);
    if (source.kind !== "keyring" && source.kind !== "env") {
      throw validationError(`Credentials can only be stored in keyring or env, not ${describeCredentialSource(source)}`);
    }
    return source;
  }

  const keyringAvailable = await isSecretStoreAvailable();
  const { choice } = await prompts({
    type: "select",
    name: "choice",
    message: "Where should credentials be stored?",
    choices: [
      { title: "OS keychain", description: keyringAvailable ? "Recommended" : "Falls back to ~/.resticguard", value: "keyring" },
      { title: ".env file", description: "Plain text; never commit it", value: "env" },
    ],
    initial: keyringAvailable ? 0 : 1,
  });
  if (choice !== "keyring" && choice !== "env") return null;
  return parseCredentialSource(choice);
}

async function askValue(key: string): Promise<string | null> {
  const isPassword = key === "RESTIC_PASSWORD";
  const { value } = await prompts({
    type: SECRET_KEY.test(key) ? "password" : "text",
    name: "value",
    message: key,
    validate: (input: string) => {
      if (!input) return "Value must not be empty";
      const weakness = isPassword ? checkPasswordStrength(input) : null;
      return weakness ? `Password ${weakness}` : true;
    },
  });
  if (typeof value !== "string") return null;

  if (isPassword) {
    const { confirm } = await prompts({
      type: "password",
      name: "confirm",
      message: "Confirm RESTIC_PASSWORD",
    });
    if (confirm !== value) {
      log.error("Passwords do not match.");
      return null;
    }
  }
  return value;
}

export async function credentialsSetupCommand(opts: CredentialsSetupOptions): Promise<void> {
  try {
    // No env fallback: only report what the chosen source really holds
    const ctx = openBaseContext({ envFile: opts.envFile }, false);
    log.header("resticguard credentials setup");

    const source = await chooseSource(opts.source);
    if (!source) {
      log.info("Setup cancelled.");
      return;
    }

    if (source.kind === "keyring") {
      log.info(`Secrets are stored under "${ctx.resolver.namespace}".`);
      if (ctx.resolver.usesDefaultNamespace) {
        log.warn("Using the default namespace. Set APP_NAME in .env if several deployments share this machine.");
      }
    } else {
      log.warn("The .env file holds secrets in plain text. Never commit it.");
    }
    log.info(chalk.dim("Without RESTIC_PASSWORD your backups cannot be restored. Keep a copy somewhere safe."));
    log.blank();

    const envFile = opts.envFile ?? ".env";
    for (const key of keysFor(ctx, opts.resticOnly)) {
      const existing = await ctx.resolver.resolve(key, source);
      if (existing) {
        const { overwrite } = await prompts({
          type: "confirm",
          name: "overwrite",
          message: `${key} is already set. Replace it?`,
          initial: false,
        });
        if (overwrite !== true) continue;
      }

      const value = await askValue(key);
      if (value === null) {
        log.info("Setup cancelled.");
        return;
      }

      if (source.kind === "env") {
        await writeEnvValue(envFile, key, value);
        ctx.env.set(key, value);
        log.success(`${key} saved to ${envFile}`);
      } else {
        const result = await ctx.resolver.store(key, value, source);
        if (result !== "stored") throw validationError(`Could not store ${key} in ${describeCredentialSource(source)}`);
        log.success(`${key} saved to ${describeCredentialSource(source)}`);
      }
    }

    log.blank();
    if (source.kind !== ctx.source.kind) {
      log.info(`Set CREDENTIAL_SOURCE=${source.kind} in ${envFile} to use these credentials.`);
    }
    log.success("Credentials configured.");
  } catch (err) {
    exitWithError(err);
  }
}

export async function credentialsCheckCommand(opts: GlobalOptions): Promise<void> {
  try {
    const ctx = openBaseContext(opts);
    const keys = keysFor(ctx, false);

    log.header(`Credentials (${describeCredentialSource(ctx.source)})`);
    const missing: string[] = [];
    for (const key of keys) {
      const value = await ctx.resolver.resolve(key, ctx.source);
      if (value) {
        log.kv(key, "found", "ok");
      } else {
        log.kv(key, "missing", "error");
        missing.push(key);
      }
    }
    log.blank();

    if (missing.length > 0) {
      throw validationError(`Missing credentials: ${missing.join(", ")}`);
    }
    log.success("All credentials found.");
  } catch (err) {
    exitWithError(err);
  }
}
