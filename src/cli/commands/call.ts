import type { Command } from 'commander';
import { renderContent } from '../../client/content.js';
import { shellGuidance } from '../../strings/index.js';
import { parseArgsJson, parseMilliseconds } from '../args.js';
import { EXIT_CODES } from '../exit-codes.js';
import { error, isJsonMode, output } from '../output.js';
import { fail, globalOptions, withServer } from './shared.js';

interface CallOptions {
  args?: string;
  timeout?: number;
  check: boolean;
}

/**
 * Register the 'call' command
 */
export function registerCallCommand(program: Command): void {
  program
    .command('call <server> <tool>')
    .description('Call a tool and print its text content')
    .option('--args <json>', 'Tool arguments as a JSON object')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parseMilliseconds)
    .option('--no-check', 'Skip checking the tool against the server tool list')
    .action(async (server: string, tool: string, options: CallOptions, command: Command) => {
      try {
        const args = parseArgsJson(options.args);
        const result = await withServer(server, globalOptions(command), (client) =>
          client.callTool(tool, args, {
            timeoutMs: options.timeout,
            checkAvailable: options.check,
          }),
        );

        if (result.isError) {
          if (isJsonMode()) {
            output(result);
          } else {
            error(shellGuidance.toolError(renderContent(result)));
          }
          process.exitCode = EXIT_CODES.TOOL_ERROR;
          return;
        }

        output(result, () => console.log(renderContent(result)));
      } catch (err) {
        fail(err);
      }
    });
}
