/**
 * JSON-RPC 2.0 Type Definitions
 *
 * Envelope types for the newline-delimited JSON-RPC wire format, plus the
 * runtime guards that classify untyped parsed JSON into those envelopes.
 */

// ============================================================================
// JSON-RPC 2.0 Base Types
// ============================================================================

export type JsonRpcId = string | number;

/**
 * JSON-RPC 2.0 Request
 */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

/**
 * JSON-RPC 2.0 Response (success)
 */
export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

/**
 * JSON-RPC 2.0 Error object
 */
export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * JSON-RPC 2.0 Error response
 */
export interface JsonRpcError {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

/**
 * JSON-RPC 2.0 Notification (no response expected)
 */
export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
}

/**
 * Any JSON-RPC message type
 */
export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcResponse
  | JsonRpcError
  | JsonRpcNotification;

/**
 * Standard JSON-RPC error codes
 */
export const JSON_RPC_ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if a value is a plain JSON object (not null, not an array)
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value));
}

/** An object tagged with `"jsonrpc": "2.0"`, whatever else it carries */
function isEnvelope(msg: unknown): msg is Record<string, unknown> {
  return isObject(msg) && msg.jsonrpc === '2.0';
}

function isErrorObject(value: unknown): value is JsonRpcErrorObject {
  return isObject(value) && typeof value.code === 'number' && typeof value.message === 'string';
}

export function isRequest(msg: unknown): msg is JsonRpcRequest {
  return isEnvelope(msg) && isId(msg.id) && typeof msg.method === 'string';
}

export function isNotification(msg: unknown): msg is JsonRpcNotification {
  return isEnvelope(msg) && !('id' in msg) && typeof msg.method === 'string';
}

export function isResponse(msg: unknown): msg is JsonRpcResponse {
  return (
    isEnvelope(msg) && isId(msg.id) && !('method' in msg) && 'result' in msg && !('error' in msg)
  );
}

export function isError(msg: unknown): msg is JsonRpcError {
  return (
    isEnvelope(msg) &&
    (msg.id === null || isId(msg.id)) &&
    !('method' in msg) &&
    isErrorObject(msg.error)
  );
}

/**
 * Type guard for any well-formed JSON-RPC 2.0 envelope
 */
export function isMessage(msg: unknown): msg is JsonRpcMessage {
  return isRequest(msg) || isResponse(msg) || isError(msg) || isNotification(msg);
}

/**
 * The id of something that looks like an answer (it has an id and no
 * method) but failed the response guards. Undefined for anything else.
 */
export function answerId(msg: unknown): JsonRpcId | undefined {
  if (!isObject(msg) || 'method' in msg || !isId(msg.id)) {
    return undefined;
  }
  return msg.id;
}
