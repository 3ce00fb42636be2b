/**
 * Server preset registry.
 *
 * Presets describe how to launch well-known tool servers. Configured servers
 * may reference a preset by name and override its args and environment.
 */

import { ConfigError } from '../rpc/errors.js';
import type { ConfigFile, ServerConfig } from '../schema/index.js';
import { errors } from '../strings/index.js';

/**
 * Launch definition for a tool server.
 */
export interface ServerPreset {
  /** Command to execute (e.g., 'docker', 'python3') */
  command: string;
  /** Arguments to pass to the command */
  args: string[];
  /** Environment variables to set */
  env?: Record<string, string>;
  /** Human-readable description */
  description?: string;
}

/**
 * Everything needed to start one named server.
 */
export interface ResolvedServer {
  name: string;
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd?: string;
  description?: string;
  timeoutMs?: number;
  required: boolean;
  /** Where the definition came from */
  source: 'config' | 'preset' | 'ad-hoc';
}

/**
 * Built-in preset registry.
 */
const PRESETS: Record<string, ServerPreset> = {
  /**
   * GitHub's official server, run in Docker. The access token is forwarded
   * from the caller's environment by name and never appears in argv.
   */
  github: {
    command: 'docker',
    args: [
      'run',
      '-i',
      '--rm',
      '-e',
      'GITHUB_PERSONAL_ACCESS_TOKEN',
      '-e',
      'GITHUB_TOOLSETS',
      'ghcr.io/github/github-mcp-server',
    ],
    env: {
      GITHUB_TOOLSETS: 'repos,issues,pull_requests',
    },
    description: 'GitHub server via Docker (needs GITHUB_PERSONAL_ACCESS_TOKEN)',
  },

  /**
   * Local filesystem server script, resolved relative to the server's cwd.
   */
  filesystem: {
    command: 'python3',
    args: ['filesystem_server.py'],
    description: 'Local filesystem server (python3 filesystem_server.py)',
  },
};

/**
 * Get a preset by name.
 */
export function getPreset(name: string): ServerPreset | undefined {
  return PRESETS[name];
}

/**
 * List all registered preset names.
 */
export function listPresets(): string[] {
  return Object.keys(PRESETS);
}

/**
 * Register a custom preset at runtime.
 */
export function registerPreset(name: string, preset: ServerPreset): void {
  PRESETS[name] = preset;
}

function fromConfig(name: string, server: ServerConfig): ResolvedServer {
  const base = server.preset !== undefined ? getPreset(server.preset) : undefined;
  if (server.preset !== undefined && !base && server.command === undefined) {
    throw new ConfigError(errors.config.unknownPreset(name, server.preset));
  }

  return {
    name,
    command: server.command ?? base?.command ?? name,
    args: server.args.length > 0 ? server.args : (base?.args ?? []),
    env: { ...base?.env, ...server.env },
    cwd: server.cwd,
    description: server.description ?? base?.description,
    timeoutMs: server.timeout_ms,
    required: server.required,
    source: 'config',
  };
}

/**
 * Resolve a server by name.
 *
 * Lookup order: servers configured in toolwire.yaml, then presets. Unknown
 * names are treated as npm package names and run through an ad-hoc npx
 * definition, so any stdio tool server package can be used without
 * registering it.
 */
export function resolveServer(name: string, config?: ConfigFile): ResolvedServer {
  const configured = config?.servers[name];
  if (configured) {
    return fromConfig(name, configured);
  }

  const preset = getPreset(name);
  if (preset) {
    return {
      name,
      command: preset.command,
      args: [...preset.args],
      env: { ...preset.env },
      description: preset.description,
      required: false,
      source: 'preset',
    };
  }

  return {
    name,
    command: 'npx',
    args: ['-y', name],
    env: {},
    description: `Ad-hoc server for ${name}`,
    required: false,
    source: 'ad-hoc',
  };
}
