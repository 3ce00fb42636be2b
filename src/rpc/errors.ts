/**
 * Error taxonomy for the transport, multiplexer and client layers.
 *
 * Every error carries a machine-readable `code`; the CLI maps codes to exit codes.
 */

import type { JsonRpcId } from './types.js';

export type ToolwireErrorCode =
  | 'LAUNCH_FAILED'
  | 'WRITE_FAILED'
  | 'PARSE_ERROR'
  | 'PROTOCOL_VIOLATION'
  | 'HANDSHAKE_FAILED'
  | 'REMOTE_ERROR'
  | 'TIMEOUT'
  | 'SESSION_CLOSED'
  | 'CANCELLED'
  | 'CONFIG_INVALID'
  | 'UNKNOWN_TOOL';

export class ToolwireError extends Error {
  constructor(
    message: string,
    public readonly code: ToolwireErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ToolwireError';
  }
}

/** The child process could not be spawned. Fatal to the session. */
export class LaunchError extends ToolwireError {
  constructor(
    message: string,
    public readonly command: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'LAUNCH_FAILED', options);
    this.name = 'LaunchError';
  }
}

export class WriteError extends ToolwireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'WRITE_FAILED', options);
    this.name = 'WriteError';
  }
}

/**
 * One inbound line could not be parsed. The read loop keeps going.
 * `payload` holds the decoded JSON when the line was valid JSON but not a
 * JSON-RPC message.
 */
export class ParseError extends ToolwireError {
  readonly payload: unknown;

  constructor(
    message: string,
    public readonly line: string,
    options?: { cause?: unknown; payload?: unknown },
  ) {
    super(message, 'PARSE_ERROR', options);
    this.name = 'ParseError';
    this.payload = options?.payload;
  }
}

/** A well-formed message that violates the protocol, e.g. an orphan response. */
export class ProtocolError extends ToolwireError {
  constructor(
    message: string,
    public readonly payload?: unknown,
  ) {
    super(message, 'PROTOCOL_VIOLATION');
    this.name = 'ProtocolError';
  }
}

export class HandshakeError extends ToolwireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'HANDSHAKE_FAILED', options);
    this.name = 'HandshakeError';
  }
}

/** The peer answered a request with a JSON-RPC error object. */
export class RemoteError extends ToolwireError {
  constructor(
    message: string,
    public readonly rpcCode: number,
    public readonly method: string,
    public readonly data?: unknown,
  ) {
    super(message, 'REMOTE_ERROR');
    this.name = 'RemoteError';
  }
}

export class TimeoutError extends ToolwireError {
  constructor(
    message: string,
    public readonly requestId: JsonRpcId,
    public readonly method: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class SessionClosedError extends ToolwireError {
  constructor(
    message: string,
    public readonly method?: string,
  ) {
    super(message, 'SESSION_CLOSED');
    this.name = 'SessionClosedError';
  }
}

export class CancelledError extends ToolwireError {
  constructor(
    message: string,
    public readonly method: string,
  ) {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export class ConfigError extends ToolwireError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', options);
    this.name = 'ConfigError';
  }
}

export class UnknownToolError extends ToolwireError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly available: string[],
  ) {
    super(message, 'UNKNOWN_TOOL');
    this.name = 'UnknownToolError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
