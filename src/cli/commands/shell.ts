import * as readline from 'node:readline';
import type { Command } from 'commander';
import { renderContent } from '../../client/content.js';
import type { ToolClient } from '../../client/tool-client.js';
import { describeError, SessionClosedError, ToolwireError } from '../../rpc/errors.js';
import { errors, shellGuidance } from '../../strings/index.js';
import { parseArgsJson, UsageError } from '../args.js';
import { fail, globalOptions, withServer } from './shared.js';

/**
 * The part of ToolClient the shell drives
 */
export type ShellClient = Pick<ToolClient, 'listTools' | 'callTool'>;

export interface ShellResult {
  lines: string[];
  exit: boolean;
}

const WORD_AND_REST = /^(\S+)(?:\s+([\s\S]*))?$/;

function splitWord(text: string): [string, string | undefined] | null {
  const match = WORD_AND_REST.exec(text.trim());
  return match ? [match[1], match[2]] : null;
}

/**
 * Evaluate one shell line against a connected client.
 *
 * Call failures (remote errors, unknown tools, bad JSON, timeouts) are
 * printed and the shell keeps going. A closed session ends it.
 */
export async function evaluateShellLine(line: string, client: ShellClient): Promise<ShellResult> {
  const parts = splitWord(line);
  if (!parts) {
    return { lines: [], exit: false };
  }
  const [command, rest] = parts;

  try {
    switch (command) {
      case 'quit':
      case 'exit':
        return { lines: [shellGuidance.goodbye], exit: true };

      case 'help':
        return { lines: [...shellGuidance.help], exit: false };

      case 'tools': {
        const tools = await client.listTools({ refresh: true });
        if (tools.length === 0) {
          return { lines: [shellGuidance.noTools], exit: false };
        }
        return {
          lines: tools.map((tool) =>
            tool.description ? `${tool.name} - ${tool.description}` : tool.name,
          ),
          exit: false,
        };
      }

      case 'call': {
        const target = rest === undefined ? null : splitWord(rest);
        if (!target) {
          return { lines: [errors.usage.shellCallUsage], exit: false };
        }
        const [tool, json] = target;
        const result = await client.callTool(tool, parseArgsJson(json), { checkAvailable: true });
        const text = renderContent(result);
        return { lines: [result.isError ? shellGuidance.toolError(text) : text], exit: false };
      }

      default:
        return { lines: [errors.usage.unknownShellCommand(command)], exit: false };
    }
  } catch (err) {
    if (err instanceof SessionClosedError) {
      return { lines: [`Error: ${err.message}`], exit: true };
    }
    if (err instanceof ToolwireError || err instanceof UsageError) {
      return { lines: [`Error: ${describeError(err)}`], exit: false };
    }
    throw err;
  }
}

export interface ShellIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Read commands line by line until 'quit', end of input, or session closure
 */
export async function runShell(client: ShellClient, io: ShellIO): Promise<void> {
  const rl = readline.createInterface({ input: io.input, terminal: false });
  io.output.write(shellGuidance.prompt);

  try {
    for await (const line of rl) {
      const result = await evaluateShellLine(line, client);
      for (const text of result.lines) {
        io.output.write(`${text}\n`);
      }
      if (result.exit) {
        return;
      }
      io.output.write(shellGuidance.prompt);
    }
  } finally {
    rl.close();
  }
}

/**
 * Register the 'shell' command
 */
export function registerShellCommand(program: Command): void {
  program
    .command('shell <server>')
    .description('Interactive session with one server')
    .action(async (server: string, _options: unknown, command: Command) => {
      try {
        await withServer(server, globalOptions(command), async (client) => {
          const tools = await client.listTools();
          console.log(shellGuidance.banner(server, tools.length));
          await runShell(client, { input: process.stdin, output: process.stdout });
        });
      } catch (err) {
        fail(err);
      }
    });
}
