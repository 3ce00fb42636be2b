import type { Command } from 'commander';
import { ServerHub } from '../../client/hub.js';
import type { ToolClient } from '../../client/tool-client.js';
import { loadConfig } from '../../config/index.js';
import { describeError, RemoteError } from '../../rpc/errors.js';
import { errors } from '../../strings/index.js';
import { exitCodeFor } from '../exit-codes.js';
import { error } from '../output.js';
import { getVersion } from '../version.js';

/**
 * Options defined on the root program
 */
export type GlobalOptions = {
  json?: boolean;
  debug?: boolean;
  config?: string;
};

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Hub over the loaded config (toolwire.yaml, --config or TOOLWIRE_CONFIG)
 */
export async function createHub(options: GlobalOptions): Promise<ServerHub> {
  const { config } = await loadConfig({ path: options.config });
  return new ServerHub({
    config,
    clientInfo: { name: 'toolwire', version: getVersion() },
  });
}

/**
 * Connect one server, run `fn` against it, and always shut it down.
 */
export async function withServer<T>(
  name: string,
  options: GlobalOptions,
  fn: (client: ToolClient) => Promise<T>,
): Promise<T> {
  const hub = await createHub(options);
  try {
    const client = await hub.connect(name);
    return await fn(client);
  } finally {
    await hub.closeAll();
  }
}

/**
 * Report an error and exit with the code mapped from it
 */
export function fail(err: unknown): never {
  const message =
    err instanceof RemoteError ? errors.call.remote(err.message, err.rpcCode) : describeError(err);
  error(message);
  process.exit(exitCodeFor(err));
}
