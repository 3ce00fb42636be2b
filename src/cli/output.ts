import chalk from 'chalk';
import Table from 'cli-table3';

/**
 * Global output format (set by --json flag)
 */
let globalJsonMode = false;

export function setJsonMode(enabled: boolean): void {
  globalJsonMode = enabled;
}

export function isJsonMode(): boolean {
  return globalJsonMode;
}

/**
 * Output data - JSON if --json flag, otherwise formatted
 */
export function output(data: unknown, formatter?: () => void): void {
  if (globalJsonMode) {
    console.log(JSON.stringify(data, null, 2));
  } else if (formatter) {
    formatter();
  } else {
    console.log(data);
  }
}

/**
 * Output success message
 */
export function success(message: string, data?: Record<string, unknown>): void {
  if (globalJsonMode) {
    console.log(JSON.stringify({ success: true, message, ...data }));
  } else {
    console.log(chalk.green('OK'), message);
  }
}

/**
 * Output error message
 */
export function error(message: string, details?: unknown): void {
  if (globalJsonMode) {
    console.error(JSON.stringify({ success: false, error: message, details }));
  } else {
    console.error(chalk.red('✗'), message);
    if (details) {
      console.error(chalk.gray(String(details)));
    }
  }
}

/**
 * Output warning message
 */
export function warn(message: string): void {
  if (globalJsonMode) {
    // Warnings are suppressed in JSON mode
  } else {
    console.warn(chalk.yellow('⚠'), message);
  }
}

/**
 * Output info message
 */
export function info(message: string): void {
  if (globalJsonMode) {
    // Info messages suppressed in JSON mode
  } else {
    console.log(chalk.blue('ℹ'), message);
  }
}

/**
 * Render rows as a borderless-header table
 */
export function formatTable(head: string[], rows: string[][]): string {
  const table = new Table({
    head: head.map((column) => chalk.bold(column)),
    style: {
      head: [],
      border: [],
    },
  });
  for (const row of rows) {
    table.push(row);
  }
  return table.toString();
}
