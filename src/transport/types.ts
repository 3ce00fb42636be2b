/**
 * Transport contracts shared by the session and the multiplexer.
 */

import type { ParseError } from '../rpc/errors.js';
import type { JsonRpcMessage } from '../rpc/types.js';

/**
 * Session lifecycle. Transitions only move forward:
 * not_started → running → closing → closed (or straight to closed on launch failure).
 */
export type SessionState = 'not_started' | 'running' | 'closing' | 'closed';

/**
 * Payload of the `end` event
 */
export interface EndOfStream {
  /** Exit code of the child, null if it was killed by a signal */
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when stop() initiated the shutdown */
  expected: boolean;
}

/**
 * What the multiplexer needs from a transport.
 *
 * Events:
 * - 'message': a parsed JSON-RPC message arrived
 * - 'parseError': one inbound line was malformed (delivery continues)
 * - 'end': the stream closed; emitted exactly once
 * - 'stderr': one line of diagnostic output from the peer
 */
export interface MessageTransport {
  readonly id: string;
  readonly state: SessionState;
  send(message: JsonRpcMessage): Promise<void>;
  on(event: 'message', listener: (message: JsonRpcMessage) => void): this;
  on(event: 'parseError', listener: (error: ParseError) => void): this;
  on(event: 'end', listener: (info: EndOfStream) => void): this;
  on(event: 'stderr', listener: (line: string) => void): this;
}
