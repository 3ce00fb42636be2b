/**
 * Diagnostic logging.
 *
 * All diagnostics go to stderr so stdout stays free for command output.
 * Debug lines are only printed when debug mode is on, via either:
 * - TOOLWIRE_DEBUG=1 environment variable
 * - --debug flag on the CLI (setDebugMode)
 */

import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger whose lines carry an additional scope segment */
  child(scope: string): Logger;
}

let debugFlag = false;

export function setDebugMode(enabled: boolean): void {
  debugFlag = enabled;
}

/**
 * Check if debug mode is enabled.
 */
export function isDebugMode(): boolean {
  return process.env.TOOLWIRE_DEBUG === '1' || debugFlag;
}

/**
 * Create a stderr logger tagged with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const tag = chalk.gray(`[${scope}]`);
  return {
    debug(message) {
      if (isDebugMode()) {
        console.error(tag, chalk.gray(message));
      }
    },
    info(message) {
      console.error(tag, message);
    },
    warn(message) {
      console.error(tag, chalk.yellow(message));
    },
    error(message) {
      console.error(tag, chalk.red(message));
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
