import chalk from 'chalk';
import type { Command } from 'commander';
import { formatTable, info, output, warn } from '../output.js';
import { createHub, fail, globalOptions, withServer } from './shared.js';

/**
 * Register the 'tools' command
 */
export function registerToolsCommand(program: Command): void {
  program
    .command('tools [server]')
    .description('List the tools of one server, or of every configured server')
    .action(async (server: string | undefined, _options: unknown, command: Command) => {
      const options = globalOptions(command);
      try {
        if (server !== undefined) {
          const tools = await withServer(server, options, (client) => client.listTools());
          output(tools, () => {
            if (tools.length === 0) {
              console.log(chalk.yellow('No tools offered'));
              return;
            }
            console.log(
              formatTable(
                ['Tool', 'Description'],
                tools.map((tool) => [tool.name, tool.description ?? '']),
              ),
            );
          });
          return;
        }

        const hub = await createHub(options);
        try {
          const { failed } = await hub.startAll();
          const tools = await hub.allTools();
          output(
            {
              servers: tools,
              failed: failed.map(({ name, error }) => ({ name, error: error.message })),
            },
            () => {
              const names = Object.keys(tools);
              if (names.length === 0 && failed.length === 0) {
                info('No servers configured. Add servers to toolwire.yaml.');
              }
              for (const name of names) {
                console.log(`${chalk.bold(name)}: ${tools[name].join(', ') || chalk.gray('(none)')}`);
              }
              for (const { name, error } of failed) {
                warn(`${name}: ${error.message}`);
              }
            },
          );
        } finally {
          await hub.closeAll();
        }
      } catch (err) {
        fail(err);
      }
    });
}
