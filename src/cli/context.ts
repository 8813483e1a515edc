import { log } from "../utils/logger.js";
import { AppEnvironment } from "../core/env.js";
import { buildResticEnv, getRepositoryUrl, loadConfig, parseStorageProvider, type AppConfig } from "../core/config.js";
import {
  CredentialResolver,
  describeCredentialSource,
  parseCredentialSource,
  providerCredentialKeys,
  type CredentialSource,
} from "../core/credentials.js";
import { describeError, validationError } from "../core/errors.js";
import { LogSink } from "../core/log-sink.js";
import { ResticClient, type CommandExecutor } from "../core/restic.js";

export interface GlobalOptions {
  envFile?: string;
}

/** Everything a command needs, set up once per run. */
export interface ScriptContext extends BaseContext {
  sink: LogSink;
  client: ResticClient;
}

export interface OpenContextOptions extends GlobalOptions {
  /** Environment to start from instead of `process.env`. */
  source?: NodeJS.ProcessEnv;
  exec?: CommandExecutor;
}

/** Configuration and credential lookup, without a repository. */
export interface BaseContext {
  env: AppEnvironment;
  config: AppConfig;
  resolver: CredentialResolver;
  source: CredentialSource;
}

export function openBaseContext(opts: OpenContextOptions = {}, fallbackToEnv = true): BaseContext {
  const env = new AppEnvironment({ envFile: opts.envFile, source: opts.source }).load();
  const config = loadConfig(env);
  const resolver = new CredentialResolver({
    env,
    namespace: config.appName,
    fallbackToEnv,
    sopsFile: config.sopsFile,
  });
  const source = parseCredentialSource(config.credentialSource);
  log.debug(`Credential source: ${describeCredentialSource(source)}`);
  return { env, config, resolver, source };
}

/**
 * Load configuration and credentials, open the run's log file and build
 * a restic client.
 */
export async function openContext(prefix: string, opts: OpenContextOptions = {}): Promise<ScriptContext> {
  const { env, config, resolver, source } = openBaseContext(opts);

  if (!config.storageProvider || !config.storageBucket) {
    throw validationError("STORAGE_PROVIDER and STORAGE_BUCKET must be set");
  }
  const provider = parseStorageProvider(config.storageProvider);
  const repository = getRepositoryUrl(provider, config.storageBucket);

  const password = await resolver.resolve("RESTIC_PASSWORD", source);
  if (!password) {
    throw validationError(`RESTIC_PASSWORD not found in ${describeCredentialSource(source)}`);
  }

  const keys = providerCredentialKeys(provider);
  const credentials = await resolver.resolveAll(keys, source);
  const missing = keys.filter((k) => !(k in credentials));
  if (missing.length > 0) {
    log.warn(`Missing provider credentials: ${missing.join(", ")}`);
  }

  const sink = await LogSink.open(prefix, config.logDir);
  await sink.write(`Started ${prefix} against ${repository}`);

  const client = new ResticClient({
    repository,
    provider,
    env: buildResticEnv(env.snapshot(), repository, password, credentials),
    binary: config.resticBinary,
    logSink: sink,
    exec: opts.exec,
  });

  return { env, config, resolver, source, sink, client };
}

/**
 * Run `action` inside a script context. Any failure is printed and logged
 * (redacted) and the process exits with code 1.
 */
export async function runScript(
  prefix: string,
  opts: OpenContextOptions,
  action: (ctx: ScriptContext) => Promise<void>,
): Promise<void> {
  let ctx: ScriptContext | undefined;
  try {
    ctx = await openContext(prefix, opts);
    await action(ctx);
    await ctx.sink.write(`Finished ${prefix}`);
  } catch (err) {
    const message = describeError(err);
    log.error(message);
    if (ctx) {
      try {
        await ctx.sink.write(`Failed: ${message}`);
        log.info(`Log file: ${ctx.sink.path}`);
      } catch (writeErr) {
        log.warn(`Could not write log file: ${describeError(writeErr)}`);
      }
    }
    process.exit(1);
  }
}

/**
 * Print a failure and exit, for commands that run without a script context.
 */
export function exitWithError(err: unknown, code = 1): never {
  log.error(describeError(err));
  process.exit(code);
}
