/**
 * Semantic exit codes for the toolwire CLI
 *
 * @see Use these constants instead of magic numbers throughout the CLI
 */

import { ToolwireError } from '../rpc/errors.js';
import { UsageError } from './args.js';

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** General error (catch-all for unexpected errors) */
  ERROR: 1,

  /** Usage error (invalid arguments, flags, or config) */
  USAGE_ERROR: 2,

  /** Not found (the server does not offer the requested tool) */
  NOT_FOUND: 3,

  /** The tool ran and reported failure, or the server answered with an error */
  TOOL_ERROR: 4,

  /** No response arrived within the request timeout */
  TIMEOUT: 5,

  /** The server process could not be launched */
  LAUNCH_FAILED: 6,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code metadata for documentation
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: 'SUCCESS',
    description: 'Command completed successfully',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.ERROR,
    name: 'ERROR',
    description: 'General error (handshake failure, session closed, unexpected error)',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.USAGE_ERROR,
    name: 'USAGE_ERROR',
    description: 'Usage error (invalid --args JSON, invalid toolwire.yaml)',
    commands: 'All commands',
  },
  {
    code: EXIT_CODES.NOT_FOUND,
    name: 'NOT_FOUND',
    description: 'Tool not offered by the server',
    commands: 'call',
  },
  {
    code: EXIT_CODES.TOOL_ERROR,
    name: 'TOOL_ERROR',
    description: 'Tool result had isError set, or the server returned a JSON-RPC error',
    commands: 'call',
  },
  {
    code: EXIT_CODES.TIMEOUT,
    name: 'TIMEOUT',
    description: 'Request timed out',
    commands: 'tools, call',
  },
  {
    code: EXIT_CODES.LAUNCH_FAILED,
    name: 'LAUNCH_FAILED',
    description: 'Server process could not be launched',
    commands: 'tools, call, shell',
  },
] as const;

/**
 * Map a thrown error to the exit code the CLI reports for it
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof UsageError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (!(err instanceof ToolwireError)) {
    return EXIT_CODES.ERROR;
  }

  switch (err.code) {
    case 'LAUNCH_FAILED':
      return EXIT_CODES.LAUNCH_FAILED;
    case 'TIMEOUT':
      return EXIT_CODES.TIMEOUT;
    case 'UNKNOWN_TOOL':
      return EXIT_CODES.NOT_FOUND;
    case 'REMOTE_ERROR':
      return EXIT_CODES.TOOL_ERROR;
    case 'CONFIG_INVALID':
      return EXIT_CODES.USAGE_ERROR;
    default:
      return EXIT_CODES.ERROR;
  }
}
