/**
 * Centralized error messages
 *
 * Organizes error messages by category so the transport, client, config and
 * CLI layers word the same failure the same way.
 */

/**
 * Child process launch and transport errors
 */
export const transportErrors = {
  spawnFailed: (command: string, reason: string) =>
    `Failed to launch '${command}': ${reason}`,
  commandNotFound: (command: string) =>
    `Failed to launch '${command}': executable not found`,
  alreadyStarted: (state: string) =>
    `Transport session cannot be started from state '${state}'`,
  notRunning: (state: string) => `Transport session is not running (state: ${state})`,
  stdinClosed: 'Child process stdin is closed',
  writeFailed: (reason: string) => `Write to child process failed: ${reason}`,
} as const;

/**
 * JSON-RPC framing and protocol errors
 */
export const protocolErrors = {
  invalidJson: (reason: string) => `Malformed JSON line: ${reason}`,
  notJsonRpc: 'Line is valid JSON but not a JSON-RPC 2.0 message',
  orphanResponse: (id: string | number) =>
    `Received response for unknown request ID: ${id}`,
  orphanError: (id: string | number) =>
    `Received error for unknown request ID: ${id}`,
  malformedResponse: (id: string | number, method: string) =>
    `Malformed response to request ${id} (method: ${method})`,
  errorWithoutId: (message: string, code: number) =>
    `Peer reported an error without a request ID: ${message} (code: ${code})`,
  invalidResult: (method: string, issues: string) =>
    `Invalid result for ${method}: ${issues}`,
} as const;

/**
 * Call-level errors
 */
export const callErrors = {
  timedOut: (id: string | number, method: string, timeoutMs: number) =>
    `Request ${id} timed out after ${timeoutMs}ms (method: ${method})`,
  cancelled: (id: string | number, method: string) =>
    `Request ${id} was cancelled (method: ${method})`,
  cancelledBeforeSend: (method: string) => `Request cancelled before it was sent (method: ${method})`,
  sessionClosed: (method: string) => `Session closed while awaiting response (method: ${method})`,
  sessionNotRunning: (method: string) =>
    `Cannot send ${method}: session is not running`,
  remote: (message: string, code: number) => `${message} (code: ${code})`,
} as const;

/**
 * Handshake and tool errors
 */
export const clientErrors = {
  alreadyInitialized: 'Client already initialized',
  initializeInProgress: 'Initialization already in progress',
  notInitialized: 'Client not initialized',
  previousHandshakeFailed: 'A previous initialization attempt failed; start a new session',
  handshakeFailed: (reason: string) => `Initialization handshake failed: ${reason}`,
  unknownTool: (name: string, available: string[]) =>
    available.length > 0
      ? `Tool '${name}' not available. Available: ${available.join(', ')}`
      : `Tool '${name}' not available. The server reported no tools.`,
} as const;

/**
 * Configuration errors
 */
export const configErrors = {
  readFailed: (file: string, reason: string) => `Failed to read config ${file}: ${reason}`,
  invalidYaml: (file: string, reason: string) => `Invalid YAML in ${file}: ${reason}`,
  invalidConfig: (file: string, issues: string) => `Invalid config in ${file}: ${issues}`,
  invalidNumber: (name: string, value: string) =>
    `${name} must be a positive integer, got '${value}'`,
  unknownPreset: (server: string, preset: string) =>
    `Server '${server}' references unknown preset '${preset}'`,
} as const;

/**
 * CLI usage errors
 */
export const usageErrors = {
  invalidArgsJson: (reason: string) => `Invalid JSON arguments: ${reason}`,
  argsNotObject: 'Tool arguments must be a JSON object',
  unknownShellCommand: (command: string) =>
    `Unknown command: ${command}. Type 'help' for available commands.`,
  shellCallUsage: 'Usage: call <tool> [json-arguments]',
} as const;

/**
 * Re-export all error categories as a single object for convenience
 */
export const errors = {
  transport: transportErrors,
  protocol: protocolErrors,
  call: callErrors,
  client: clientErrors,
  config: configErrors,
  usage: usageErrors,
} as const;
