/**
 * toolwire - multiplexed JSON-RPC 2.0 client for tool servers over stdio
 */

// Wire types and errors
export * from './rpc/types.js';
export * from './rpc/errors.js';
export { PendingRequests, type PendingRequest, type RegisterOptions } from './rpc/pending.js';
export {
  DEFAULT_REQUEST_TIMEOUT_MS,
  RequestMultiplexer,
  type RequestMultiplexerOptions,
  type RequestOptions,
} from './rpc/multiplexer.js';

// Transport
export { encodeLine, LineFramer } from './transport/framing.js';
export {
  DEFAULT_KILL_GRACE_MS,
  TransportSession,
  type TransportSessionOptions,
} from './transport/session.js';
export type { EndOfStream, MessageTransport, SessionState } from './transport/types.js';

// Client
export {
  ToolClient,
  type CallToolOptions,
  type ToolClientEvents,
  type ToolClientOptions,
} from './client/tool-client.js';
export { ServerHub, type HubStartResult, type ServerHubOptions } from './client/hub.js';
export { isTextContent, renderContent, textContent } from './client/content.js';

// Servers, config and schemas
export {
  getPreset,
  listPresets,
  registerPreset,
  resolveServer,
  type ResolvedServer,
  type ServerPreset,
} from './servers/presets.js';
export * from './config/index.js';
export * from './schema/index.js';
export { createLogger, isDebugMode, setDebugMode, silentLogger, type Logger } from './utils/logger.js';
