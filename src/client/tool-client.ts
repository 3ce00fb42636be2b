/**
 * Tool Client
 *
 * Drives one tool server over JSON-RPC 2.0 stdio:
 * - Launch the server process
 * - Initialize handshake (initialize → notifications/initialized)
 * - Discover tools at runtime (tools/list, with pagination and caching)
 * - Invoke tools (tools/call)
 */

import { EventEmitter } from 'node:events';
import {
  describeError,
  HandshakeError,
  ProtocolError,
  UnknownToolError,
} from '../rpc/errors.js';
import { RequestMultiplexer, type RequestOptions } from '../rpc/multiplexer.js';
import type { JsonRpcNotification } from '../rpc/types.js';
import {
  CallToolResultSchema,
  formatIssues,
  InitializeResultSchema,
  ListToolsResultSchema,
  PROTOCOL_VERSION,
  type CallToolResult,
  type ImplementationInfo,
  type InitializeResult,
  type Tool,
} from '../schema/index.js';
import { errors } from '../strings/index.js';
import { TransportSession, type TransportSessionOptions } from '../transport/session.js';
import type { EndOfStream } from '../transport/types.js';
import { createLogger } from '../utils/logger.js';

/**
 * Options for ToolClient
 */
export interface ToolClientOptions extends TransportSessionOptions {
  /** Default timeout for requests in milliseconds (default: 30000) */
  timeout?: number;
  /** Per-method timeout overrides in milliseconds */
  methodTimeouts?: Record<string, number>;
  /** Client info sent during the handshake */
  clientInfo?: {
    name: string;
    version?: string;
  };
}

/**
 * Options for callTool
 */
export interface CallToolOptions extends RequestOptions {
  /** Check the name against the discovered tool list before calling */
  checkAvailable?: boolean;
}

type HandshakeState = 'idle' | 'pending' | 'done' | 'failed';

// Event types for type-safe event handling
export interface ToolClientEvents {
  notification: (notification: JsonRpcNotification) => void;
  stderr: (line: string) => void;
  close: (info: EndOfStream) => void;
}

/**
 * Tool Client
 *
 * Events:
 * - 'notification': Emitted for every notification from the server
 * - 'stderr': Emitted for each diagnostic line the server writes to stderr
 * - 'close': Emitted when the server's output stream ends
 */
export class ToolClient extends EventEmitter {
  readonly transport: TransportSession;
  private readonly rpc: RequestMultiplexer;
  private readonly clientInfo: { name: string; version: string };
  private handshake: HandshakeState = 'idle';
  private initResult: InitializeResult | null = null;
  private toolCache: Tool[] | null = null;

  constructor(options: ToolClientOptions) {
    super();
    const logger = options.logger ?? createLogger(options.command);

    this.clientInfo = {
      name: options.clientInfo?.name ?? 'toolwire',
      version: options.clientInfo?.version ?? '0.0.0',
    };

    this.transport = new TransportSession({ ...options, logger: logger.child('transport') });
    this.rpc = new RequestMultiplexer(this.transport, {
      timeout: options.timeout,
      methodTimeouts: options.methodTimeouts,
      logger: logger.child('rpc'),
      onNotification: (notification) => this.handleNotification(notification),
    });

    this.transport.on('stderr', (line: string) => this.emit('stderr', line));
    this.rpc.on('close', (info: EndOfStream) => this.emit('close', info));
  }

  /**
   * Launch the server process
   *
   * @throws LaunchError if the process cannot be spawned
   */
  async start(): Promise<void> {
    await this.transport.start();
  }

  /**
   * Perform the initialize handshake. Must succeed exactly once before any
   * tool call.
   *
   * @returns the server's initialize result
   * @throws HandshakeError if already initialized, or the exchange fails
   */
  async initialize(): Promise<InitializeResult> {
    if (this.handshake === 'done') {
      throw new HandshakeError(errors.client.alreadyInitialized);
    }
    if (this.handshake === 'pending') {
      throw new HandshakeError(errors.client.initializeInProgress);
    }
    if (this.handshake === 'failed') {
      throw new HandshakeError(errors.client.previousHandshakeFailed);
    }

    this.handshake = 'pending';
    try {
      const raw = await this.rpc.request('initialize', {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: this.clientInfo,
      });

      const parsed = InitializeResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolError(
          errors.protocol.invalidResult('initialize', formatIssues(parsed.error)),
          raw,
        );
      }

      await this.rpc.notify('notifications/initialized');

      this.initResult = parsed.data;
      this.handshake = 'done';
      return parsed.data;
    } catch (err) {
      this.handshake = 'failed';
      throw new HandshakeError(errors.client.handshakeFailed(describeError(err)), {
        cause: err,
      });
    }
  }

  /**
   * List the server's tools, following pagination. The list is cached
   * until `refresh` is set or the server announces a change.
   */
  async listTools(options: { refresh?: boolean } = {}): Promise<Tool[]> {
    this.assertInitialized();
    if (this.toolCache && !options.refresh) {
      return this.toolCache;
    }

    const tools: Tool[] = [];
    const seenCursors = new Set<string>();
    let cursor: string | undefined;
    do {
      const raw = await this.rpc.request(
        'tools/list',
        cursor === undefined ? undefined : { cursor },
      );
      const parsed = ListToolsResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ProtocolError(
          errors.protocol.invalidResult('tools/list', formatIssues(parsed.error)),
          raw,
        );
      }
      tools.push(...parsed.data.tools);

      cursor = parsed.data.nextCursor;
      if (cursor !== undefined) {
        if (seenCursors.has(cursor)) break;
        seenCursors.add(cursor);
      }
    } while (cursor !== undefined);

    this.toolCache = tools;
    return tools;
  }

  /**
   * Look a tool up in the cached list (call listTools first)
   */
  getTool(name: string): Tool | undefined {
    return this.toolCache?.find((tool) => tool.name === name);
  }

  /**
   * Invoke a tool.
   *
   * A result with `isError: true` is returned, not thrown: the call itself
   * succeeded and the tool reported a failure.
   *
   * @throws HandshakeError if initialize() has not completed
   * @throws UnknownToolError if `checkAvailable` is set and the tool is not listed
   * @throws RemoteError, TimeoutError, SessionClosedError, CancelledError as
   *   for any request
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    options: CallToolOptions = {},
  ): Promise<CallToolResult> {
    this.assertInitialized();

    if (options.checkAvailable) {
      const tools = await this.listTools();
      if (!tools.some((tool) => tool.name === name)) {
        const available = tools.map((tool) => tool.name);
        throw new UnknownToolError(errors.client.unknownTool(name, available), name, available);
      }
    }

    const raw = await this.rpc.request(
      'tools/call',
      { name, arguments: args },
      { timeoutMs: options.timeoutMs, signal: options.signal },
    );

    const parsed = CallToolResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(
        errors.protocol.invalidResult('tools/call', formatIssues(parsed.error)),
        raw,
      );
    }
    return parsed.data;
  }

  /**
   * Server identity reported during the handshake
   */
  get serverInfo(): ImplementationInfo | undefined {
    return this.initResult?.serverInfo;
  }

  get serverCapabilities(): Record<string, unknown> {
    return this.initResult?.capabilities ?? {};
  }

  isInitialized(): boolean {
    return this.handshake === 'done';
  }

  isClosed(): boolean {
    return this.rpc.isClosed();
  }

  /**
   * Number of requests awaiting a response
   */
  get pendingCount(): number {
    return this.rpc.pendingCount;
  }

  /**
   * Reject pending calls and stop the server process. Idempotent.
   */
  async close(): Promise<void> {
    this.rpc.close();
    await this.transport.stop();
  }

  private assertInitialized(): void {
    if (this.handshake !== 'done') {
      throw new HandshakeError(errors.client.notInitialized);
    }
  }

  private handleNotification(notification: JsonRpcNotification): void {
    if (notification.method === 'notifications/tools/list_changed') {
      this.toolCache = null;
    }
    this.emit('notification', notification);
  }
}
