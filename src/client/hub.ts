/**
 * Server hub.
 *
 * Keeps several named tool servers connected at once. Each server gets its
 * own ToolClient, and with it its own transport, id counter and pending
 * table.
 */

import type { ConfigFile } from '../schema/index.js';
import { resolveServer, type ResolvedServer } from '../servers/presets.js';
import { describeError } from '../rpc/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ToolClient } from './tool-client.js';

export interface ServerHubOptions {
  config: ConfigFile;
  clientInfo?: { name: string; version?: string };
  logger?: Logger;
}

export interface HubStartResult {
  started: string[];
  failed: Array<{ name: string; error: Error }>;
}

export class ServerHub {
  private readonly clients = new Map<string, ToolClient>();
  private readonly logger: Logger;

  constructor(private readonly options: ServerHubOptions) {
    this.logger = options.logger ?? createLogger('hub');
  }

  /**
   * Build an unstarted client for a resolved server definition
   */
  createClient(server: ResolvedServer): ToolClient {
    const { defaults } = this.options.config;
    return new ToolClient({
      command: server.command,
      args: server.args,
      env: server.env,
      cwd: server.cwd,
      timeout: server.timeoutMs ?? defaults.timeout_ms,
      killGraceMs: defaults.kill_grace_ms,
      clientInfo: this.options.clientInfo,
      logger: this.logger.child(server.name),
    });
  }

  /**
   * Start and initialize one server, or return it if already connected.
   *
   * @throws LaunchError or HandshakeError; the half-started process is stopped
   */
  async connect(name: string): Promise<ToolClient> {
    const existing = this.clients.get(name);
    if (existing && !existing.isClosed()) {
      return existing;
    }

    const client = this.createClient(resolveServer(name, this.options.config));
    try {
      await client.start();
      await client.initialize();
    } catch (err) {
      await client.close();
      throw err;
    }

    client.on('close', () => {
      if (this.clients.get(name) === client) {
        this.clients.delete(name);
      }
    });
    this.clients.set(name, client);
    return client;
  }

  /**
   * Connect every named server (default: all configured servers) in
   * parallel. Failures are logged and skipped, unless the server is marked
   * required, in which case everything is closed and the error rethrown.
   */
  async startAll(names: string[] = Object.keys(this.options.config.servers)): Promise<HubStartResult> {
    const outcomes = await Promise.allSettled(names.map((name) => this.connect(name)));

    const result: HubStartResult = { started: [], failed: [] };
    for (const [index, outcome] of outcomes.entries()) {
      const name = names[index];
      if (outcome.status === 'fulfilled') {
        result.started.push(name);
        continue;
      }

      const error =
        outcome.reason instanceof Error ? outcome.reason : new Error(describeError(outcome.reason));
      if (this.options.config.servers[name]?.required ?? false) {
        await this.closeAll();
        throw error;
      }
      this.logger.warn(`Skipping ${name}: ${error.message}`);
      result.failed.push({ name, error });
    }

    return result;
  }

  get(name: string): ToolClient | undefined {
    return this.clients.get(name);
  }

  /**
   * Names of connected servers
   */
  names(): string[] {
    return Array.from(this.clients.keys());
  }

  /**
   * Tool names per connected server
   */
  async allTools(): Promise<Record<string, string[]>> {
    const entries = await Promise.all(
      Array.from(this.clients.entries()).map(async ([name, client]) => {
        const tools = await client.listTools();
        return [name, tools.map((tool) => tool.name)] as const;
      }),
    );
    return Object.fromEntries(entries);
  }

  async closeAll(): Promise<void> {
    const clients = Array.from(this.clients.values());
    this.clients.clear();
    await Promise.all(clients.map((client) => client.close()));
  }
}
