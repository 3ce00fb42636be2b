/**
 * Request Multiplexer
 *
 * Turns a message transport into correlated request/response calls:
 * - Auto-incrementing request IDs, unique per session
 * - Out-of-order response routing by ID
 * - Per-request timeout (default 30s) with per-method overrides
 * - Cancellation through AbortSignal
 * - Rejection of every pending request when the session ends
 */

import { EventEmitter } from 'node:events';
import {
  CancelledError,
  describeError,
  ProtocolError,
  RemoteError,
  SessionClosedError,
  WriteError,
  type ParseError,
} from './errors.js';
import { PendingRequests } from './pending.js';
import {
  answerId,
  isError,
  isNotification,
  isRequest,
  isResponse,
  JSON_RPC_ERROR_CODES,
  type JsonRpcError,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './types.js';
import type { EndOfStream, MessageTransport } from '../transport/types.js';
import { errors } from '../strings/index.js';
import { createLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/**
 * Options for RequestMultiplexer
 */
export interface RequestMultiplexerOptions {
  /** Default timeout for pending requests in milliseconds (default: 30000) */
  timeout?: number;
  /** Per-method timeout overrides in milliseconds */
  methodTimeouts?: Record<string, number>;
  /** Receives notifications sent by the peer; they are dropped otherwise */
  onNotification?: (notification: JsonRpcNotification) => void;
  logger?: Logger;
}

/**
 * Options for a single request
 */
export interface RequestOptions {
  /** Overrides the default and per-method timeouts */
  timeoutMs?: number;
  /** Aborting releases the caller with CancelledError */
  signal?: AbortSignal;
}

/**
 * Events:
 * - 'notification': a notification arrived from the peer
 * - 'protocolError': an orphan or otherwise unroutable message (no caller affected)
 * - 'parseError': a malformed line was skipped
 * - 'close': the session ended and all pending requests were rejected
 */
export class RequestMultiplexer extends EventEmitter {
  private readonly pending = new PendingRequests();
  private readonly timeout: number;
  private readonly methodTimeouts: Record<string, number>;
  private readonly onNotification?: (notification: JsonRpcNotification) => void;
  private readonly logger: Logger;
  private closed = false;

  constructor(
    private readonly transport: MessageTransport,
    options: RequestMultiplexerOptions = {},
  ) {
    super();
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.methodTimeouts = { ...options.methodTimeouts };
    this.onNotification = options.onNotification;
    this.logger = options.logger ?? createLogger('rpc');

    transport.on('message', (message) => this.handleMessage(message));
    transport.on('parseError', (error) => this.handleParseError(error));
    transport.on('end', (info) => this.handleEnd(info));
  }

  /**
   * Send a request and wait for its response.
   *
   * @returns the response's `result`, unmodified
   * @throws RemoteError if the peer answers with an error object
   * @throws TimeoutError if no answer arrives in time
   * @throws SessionClosedError if the session ends first, or is not running
   * @throws CancelledError if `options.signal` aborts first
   * @throws WriteError if the request could not be written
   */
  async request(method: string, params?: unknown, options: RequestOptions = {}): Promise<unknown> {
    if (this.closed || this.transport.state !== 'running') {
      throw new SessionClosedError(errors.call.sessionNotRunning(method), method);
    }
    if (options.signal?.aborted) {
      throw new CancelledError(errors.call.cancelledBeforeSend(method), method);
    }

    const id = this.pending.allocateId();
    const timeoutMs = options.timeoutMs ?? this.methodTimeouts[method] ?? this.timeout;
    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      id,
      method,
      ...(params !== undefined && { params }),
    };

    const response = this.pending.register(id, method, {
      timeoutMs,
      signal: options.signal,
    });

    this.logger.debug(`-> ${method} #${id}`);
    this.transport.send(request).catch((err: unknown) => {
      const error = err instanceof Error ? err : new WriteError(describeError(err));
      this.pending.take(id)?.reject(error);
    });

    return response;
  }

  /**
   * Send a notification (no response expected)
   */
  async notify(method: string, params?: unknown): Promise<void> {
    if (this.closed || this.transport.state !== 'running') {
      throw new SessionClosedError(errors.call.sessionNotRunning(method), method);
    }

    const notification: JsonRpcNotification = {
      jsonrpc: '2.0',
      method,
      ...(params !== undefined && { params }),
    };

    this.logger.debug(`-> ${method} (notification)`);
    await this.transport.send(notification);
  }

  /**
   * Reject every pending request and refuse new ones. Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.rejectPending();
  }

  isClosed(): boolean {
    return this.closed;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private rejectPending(): void {
    const count = this.pending.rejectAll(
      (entry) => new SessionClosedError(errors.call.sessionClosed(entry.method), entry.method),
    );
    if (count > 0) {
      this.logger.debug(`Rejected ${count} pending request(s)`);
    }
  }

  private handleMessage(message: JsonRpcMessage): void {
    if (isResponse(message)) {
      this.handleResponse(message);
    } else if (isError(message)) {
      this.handleErrorResponse(message);
    } else if (isRequest(message)) {
      this.handlePeerRequest(message);
    } else if (isNotification(message)) {
      this.onNotification?.(message);
      this.emit('notification', message);
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    const entry = this.pending.take(response.id);
    if (!entry) {
      this.reportProtocolError(errors.protocol.orphanResponse(response.id), response);
      return;
    }
    this.logger.debug(`<- ${entry.method} #${response.id} (${Date.now() - entry.createdAt}ms)`);
    entry.resolve(response.result);
  }

  private handleErrorResponse(response: JsonRpcError): void {
    if (response.id === null) {
      this.reportProtocolError(
        errors.protocol.errorWithoutId(response.error.message, response.error.code),
        response,
      );
      return;
    }

    const entry = this.pending.take(response.id);
    if (!entry) {
      this.reportProtocolError(errors.protocol.orphanError(response.id), response);
      return;
    }

    this.logger.debug(
      `<- ${entry.method} #${response.id} error ${response.error.code}: ${response.error.message}`,
    );
    entry.reject(
      new RemoteError(
        response.error.message,
        response.error.code,
        entry.method,
        response.error.data,
      ),
    );
  }

  /**
   * Requests from the peer. Only `ping` is served; everything else gets
   * "Method not found".
   */
  private handlePeerRequest(request: JsonRpcRequest): void {
    const reply: JsonRpcMessage =
      request.method === 'ping'
        ? { jsonrpc: '2.0', id: request.id, result: {} }
        : {
            jsonrpc: '2.0',
            id: request.id,
            error: { code: JSON_RPC_ERROR_CODES.METHOD_NOT_FOUND, message: 'Method not found' },
          };

    this.transport.send(reply).catch((err: unknown) => {
      this.logger.warn(`Failed to answer ${request.method}: ${describeError(err)}`);
    });
  }

  /**
   * A line that is not a valid message. If it answers a pending request
   * (an id but no method), that caller gets a ProtocolError now instead of
   * waiting for its timeout.
   */
  private handleParseError(error: ParseError): void {
    this.logger.warn(`${error.message} (line: ${truncate(error.line)})`);
    this.emit('parseError', error);

    const id = answerId(error.payload);
    const entry = id === undefined ? undefined : this.pending.take(id);
    if (entry) {
      const message = errors.protocol.malformedResponse(entry.id, entry.method);
      this.logger.warn(message);
      entry.reject(new ProtocolError(message, error.payload));
    }
  }

  private handleEnd(info: EndOfStream): void {
    if (!info.expected) {
      this.logger.warn(
        `Session ended unexpectedly with ${this.pending.size} pending request(s)`,
      );
    }
    this.closed = true;
    this.rejectPending();
    this.emit('close', info);
  }

  private reportProtocolError(message: string, payload: unknown): void {
    this.logger.warn(message);
    this.emit('protocolError', new ProtocolError(message, payload));
  }
}

function truncate(line: string, max = 120): string {
  return line.length > max ? `${line.slice(0, max)}…` : line;
}
