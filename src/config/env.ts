/**
 * Environment variable helpers for configuration values.
 */

import { ConfigError } from '../rpc/errors.js';
import { errors } from '../strings/index.js';

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `${NAME}` references with values from `env`. Unset variables
 * expand to an empty string. Values are substituted verbatim; credentials
 * pass through without inspection.
 */
export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_REFERENCE, (_match, name: string) => env[name] ?? '');
}

/**
 * Read a positive integer from the environment.
 *
 * @returns undefined when the variable is unset or empty
 * @throws ConfigError when the value is not a positive integer
 */
export function readPositiveInt(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(errors.config.invalidNumber(name, raw));
  }
  return value;
}
