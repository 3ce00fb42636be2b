#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command } from 'commander';
import { setDebugMode } from '../utils/logger.js';
import {
  registerCallCommand,
  registerServersCommand,
  registerShellCommand,
  registerToolsCommand,
} from './commands/index.js';
import type { GlobalOptions } from './commands/shared.js';
import { setJsonMode } from './output.js';
import { getVersion } from './version.js';

const program = new Command();

program
  .name('toolwire')
  .description('JSON-RPC client for tool servers over stdio')
  .version(getVersion())
  .option('--json', 'Output in JSON format')
  .option('--debug', 'Print protocol diagnostics to stderr')
  .option('--config <path>', 'Path to toolwire.yaml')
  .showSuggestionAfterError()
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.json) {
      setJsonMode(true);
    }
    if (opts.debug) {
      setDebugMode(true);
    }
  });

registerServersCommand(program);
registerToolsCommand(program);
registerCallCommand(program);
registerShellCommand(program);

export { program };

// Parse and execute (only when run directly)
// Use realpathSync to resolve symlinks (e.g., when run via npm link)
const scriptPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
if (scriptPath && import.meta.url === pathToFileURL(scriptPath).href) {
  await program.parseAsync();
}
