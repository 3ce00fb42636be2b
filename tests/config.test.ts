import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { expandEnv, loadConfig, parseConfig, readPositiveInt } from '../src/config/index.js';
import { ConfigError } from '../src/rpc/errors.js';

const FILE = '/etc/toolwire/toolwire.yaml';

const SAMPLE = `
defaults:
  timeout_ms: 10000
servers:
  github:
    preset: github
    env:
      GITHUB_PERSONAL_ACCESS_TOKEN: "\${TEST_TOKEN}"
  local:
    command: python3
    args: [server.py, --root, "\${DATA_DIR}"]
    cwd: ./servers
    required: true
`;

describe('expandEnv', () => {
  it('should substitute set variables and blank unset ones', () => {
    expect(expandEnv('a-${ONE}-${MISSING}-b', { ONE: '1' })).toBe('a-1--b');
  });

  it('should leave text without references alone', () => {
    expect(expandEnv('$HOME and {braces}', {})).toBe('$HOME and {braces}');
  });
});

describe('readPositiveInt', () => {
  it('should read positive integers and ignore unset values', () => {
    expect(readPositiveInt('N', { N: '250' })).toBe(250);
    expect(readPositiveInt('N', {})).toBeUndefined();
    expect(readPositiveInt('N', { N: '  ' })).toBeUndefined();
  });

  it.each(['abc', '0', '-5', '1.5'])('should reject %s', (value) => {
    expect(() => readPositiveInt('N', { N: value })).toThrow(
      `N must be a positive integer, got '${value}'`,
    );
  });
});

describe('parseConfig', () => {
  const env = { TEST_TOKEN: 'test-secret', DATA_DIR: '/tmp/data' };

  it('should parse servers and fill defaults', () => {
    const config = parseConfig(SAMPLE, FILE, env);

    expect(config.defaults).toEqual({ timeout_ms: 10000, kill_grace_ms: 3000 });
    expect(config.servers.github).toEqual({
      preset: 'github',
      args: [],
      env: { GITHUB_PERSONAL_ACCESS_TOKEN: 'test-secret' },
      required: false,
    });
  });

  it('should expand variables and resolve cwd against the file', () => {
    const config = parseConfig(SAMPLE, FILE, env);

    expect(config.servers.local.args).toEqual(['server.py', '--root', '/tmp/data']);
    expect(config.servers.local.cwd).toBe('/etc/toolwire/servers');
    expect(config.servers.local.required).toBe(true);
  });

  it('should treat an empty file as defaults', () => {
    expect(parseConfig('', FILE, {})).toEqual({
      defaults: { timeout_ms: 30000, kill_grace_ms: 3000 },
      servers: {},
    });
  });

  it('should apply TOOLWIRE_TIMEOUT_MS over the file', () => {
    const config = parseConfig(SAMPLE, FILE, { ...env, TOOLWIRE_TIMEOUT_MS: '2500' });

    expect(config.defaults.timeout_ms).toBe(2500);
  });

  it('should reject an invalid TOOLWIRE_TIMEOUT_MS', () => {
    expect(() => parseConfig('', FILE, { TOOLWIRE_TIMEOUT_MS: 'soon' })).toThrow(
      "TOOLWIRE_TIMEOUT_MS must be a positive integer, got 'soon'",
    );
  });

  it('should reject malformed YAML', () => {
    expect(() => parseConfig('servers: [unclosed', FILE, {})).toThrow(
      `Invalid YAML in ${FILE}`,
    );
  });

  it('should reject a server without preset or command', () => {
    const content = 'servers:\n  broken:\n    args: [x]\n';

    expect(() => parseConfig(content, FILE, {})).toThrow(
      `Invalid config in ${FILE}: servers.broken: Either preset or command is required`,
    );
  });

  it('should reject wrongly typed values', () => {
    const content = 'defaults:\n  timeout_ms: fast\n';

    expect(() => parseConfig(content, FILE, {})).toThrow(ConfigError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolwire-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should fall back to defaults when toolwire.yaml is absent', async () => {
    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded.path).toBeNull();
    expect(loaded.config.servers).toEqual({});
  });

  it('should read toolwire.yaml from the working directory', async () => {
    await fs.writeFile(path.join(dir, 'toolwire.yaml'), 'servers:\n  fs:\n    preset: filesystem\n');

    const loaded = await loadConfig({ cwd: dir, env: {} });

    expect(loaded.path).toBe(path.join(dir, 'toolwire.yaml'));
    expect(loaded.config.servers.fs.preset).toBe('filesystem');
  });

  it('should read the file named by TOOLWIRE_CONFIG', async () => {
    const file = path.join(dir, 'custom.yaml');
    await fs.writeFile(file, 'defaults:\n  kill_grace_ms: 500\n');

    const loaded = await loadConfig({ cwd: dir, env: { TOOLWIRE_CONFIG: file } });

    expect(loaded.path).toBe(file);
    expect(loaded.config.defaults.kill_grace_ms).toBe(500);
  });

  it('should fail when an explicit path does not exist', async () => {
    await expect(loadConfig({ cwd: dir, path: 'missing.yaml', env: {} })).rejects.toThrow(
      `Failed to read config ${path.join(dir, 'missing.yaml')}`,
    );
  });
});
