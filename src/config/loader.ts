import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as YAML from 'yaml';
import { ConfigError, describeError } from '../rpc/errors.js';
import { ConfigFileSchema, formatIssues, type ConfigFile } from '../schema/index.js';
import { errors } from '../strings/index.js';
import { expandEnv, readPositiveInt } from './env.js';

/**
 * Config file looked up in the working directory when no path is given
 */
export const CONFIG_FILE_NAME = 'toolwire.yaml';

export interface LoadConfigOptions {
  /** Explicit config path; overrides TOOLWIRE_CONFIG */
  path?: string;
  /** Directory to resolve relative paths against (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: ConfigFile;
  /** Absolute path of the file read, or null when running on defaults */
  path: string | null;
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Load toolwire.yaml.
 *
 * An explicit path (option or TOOLWIRE_CONFIG) must exist. Without one, a
 * missing toolwire.yaml in the working directory means defaults only.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const explicit = options.path ?? env.TOOLWIRE_CONFIG;
  const file = path.resolve(cwd, explicit ?? CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (explicit === undefined && isNodeError(err) && err.code === 'ENOENT') {
      return { config: applyEnvOverrides(ConfigFileSchema.parse({}), env), path: null };
    }
    throw new ConfigError(errors.config.readFailed(file, describeError(err)), { cause: err });
  }

  return { config: parseConfig(content, file, env), path: file };
}

/**
 * Parse and validate config file content.
 *
 * `${VAR}` references in server args and env are expanded from `env`, and
 * relative server working directories are resolved against the file's
 * directory.
 */
export function parseConfig(
  content: string,
  file: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigFile {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(errors.config.invalidYaml(file, describeError(err)), { cause: err });
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(errors.config.invalidConfig(file, formatIssues(result.error)));
  }

  const config = result.data;
  const baseDir = path.dirname(file);
  for (const server of Object.values(config.servers)) {
    server.args = server.args.map((arg) => expandEnv(arg, env));
    server.env = Object.fromEntries(
      Object.entries(server.env).map(([key, value]) => [key, expandEnv(value, env)]),
    );
    if (server.cwd !== undefined) {
      server.cwd = path.resolve(baseDir, expandEnv(server.cwd, env));
    }
  }

  return applyEnvOverrides(config, env);
}

/**
 * Apply TOOLWIRE_TIMEOUT_MS over the file's default timeout
 */
export function applyEnvOverrides(config: ConfigFile, env: NodeJS.ProcessEnv): ConfigFile {
  const timeout = readPositiveInt('TOOLWIRE_TIMEOUT_MS', env);
  if (timeout !== undefined) {
    config.defaults.timeout_ms = timeout;
  }
  return config;
}
