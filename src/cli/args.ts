import { InvalidArgumentError } from 'commander';
import { describeError } from '../rpc/errors.js';
import { isObject } from '../rpc/types.js';
import { errors } from '../strings/index.js';

/**
 * Bad command-line input detected after commander has parsed it
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Parse tool arguments given as a JSON object. Missing or blank input means
 * no arguments.
 */
export function parseArgsJson(text: string | undefined): Record<string, unknown> {
  if (text === undefined || text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new UsageError(errors.usage.invalidArgsJson(describeError(err)));
  }

  if (!isObject(parsed)) {
    throw new UsageError(errors.usage.argsNotObject);
  }
  return parsed;
}

/**
 * commander option parser for millisecond values
 */
export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer number of milliseconds.');
  }
  return parsed;
}
