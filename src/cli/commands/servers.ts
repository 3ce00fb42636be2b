import chalk from 'chalk';
import type { Command } from 'commander';
import { loadConfig } from '../../config/index.js';
import type { ConfigFile } from '../../schema/index.js';
import { listPresets, resolveServer, type ResolvedServer } from '../../servers/presets.js';
import { formatTable, output } from '../output.js';
import { fail, globalOptions } from './shared.js';

export interface ServerListing {
  name: string;
  source: ResolvedServer['source'];
  /** Command line as it would be launched */
  command: string;
  description?: string;
  required: boolean;
}

function toListing(server: ResolvedServer): ServerListing {
  return {
    name: server.name,
    source: server.source,
    command: [server.command, ...server.args].join(' '),
    description: server.description,
    required: server.required,
  };
}

/**
 * Configured servers first, then presets the config does not shadow
 */
export function listServers(config: ConfigFile): ServerListing[] {
  const configured = Object.keys(config.servers);
  const presets = listPresets().filter((name) => !configured.includes(name));
  return [...configured, ...presets].map((name) => toListing(resolveServer(name, config)));
}

/**
 * Register the 'servers' command
 */
export function registerServersCommand(program: Command): void {
  program
    .command('servers')
    .description('List configured servers and built-in presets')
    .action(async (_options: unknown, command: Command) => {
      try {
        const { config, path } = await loadConfig({ path: globalOptions(command).config });
        const servers = listServers(config);

        output({ config: path, servers }, () => {
          if (path === null) {
            console.log(chalk.gray('No toolwire.yaml found; showing presets only'));
          }
          console.log(
            formatTable(
              ['Name', 'Source', 'Command', 'Description'],
              servers.map((server) => [
                server.required ? `${server.name} ${chalk.gray('(required)')}` : server.name,
                server.source,
                server.command,
                server.description ?? '',
              ]),
            ),
          );
        });
      } catch (err) {
        fail(err);
      }
    });
}
