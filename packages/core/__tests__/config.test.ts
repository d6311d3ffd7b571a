/**
 * Config loader tests
 *
 * Tests ${ENV:VAR} resolution, group merging, active filtering and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig, parseConfig, parseServerDefinition } from '../src/config/index.js';
import { ConfigurationError } from '../src/utils/errors.js';

describe('Config Loader', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'switchboard-test-'));
    configPath = path.join(tempDir, 'switchboard.yaml');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load valid configuration with defaults applied', async () => {
    const configYaml = `
version: "2"
servers:
  - name: files
    command: node
    args: ["./servers/files.js"]
  - name: search
    command: search-server
`;

    await fs.writeFile(configPath, configYaml);
    const config = await loadConfig(configPath);

    expect(config.version).toBe('2');
    expect(config.servers.map(server => server.name)).toEqual(['files', 'search']);
    expect(config.servers[0]?.args).toEqual(['./servers/files.js']);
    expect(config.servers[1]?.args).toEqual([]);
    expect(config.servers[1]?.env).toEqual({});
    expect(config.defaults.handshake_timeout_ms).toBe(10000);
    expect(config.defaults.request_timeout_ms).toBe(30000);
    expect(config.defaults.reconnect).toEqual({
      base_delay_ms: 500,
      max_delay_ms: 30000,
      max_attempts: 5,
      jitter_ratio: 0.2,
    });
    expect(config.defaults.health_check.failure_threshold).toBe(3);
  });

  it('should load a JSON file', async () => {
    const jsonPath = path.join(tempDir, 'switchboard.json');
    await fs.writeFile(
      jsonPath,
      JSON.stringify({
        servers: [{ name: 'db', command: 'node', env: { DB_PATH: '/tmp/test.db' } }],
        defaults: { request_timeout_ms: 2000 },
      })
    );

    const config = await loadConfig(jsonPath);

    expect(config.servers[0]?.env).toEqual({ DB_PATH: '/tmp/test.db' });
    expect(config.defaults.request_timeout_ms).toBe(2000);
  });

  it('should resolve ${ENV:VAR} references', async () => {
    process.env.SWITCHBOARD_TEST_TOKEN = 'test-secret';

    const configYaml = `
servers:
  - name: files
    command: node
    env:
      API_TOKEN: \${ENV:SWITCHBOARD_TEST_TOKEN}
`;

    await fs.writeFile(configPath, configYaml);
    const config = await loadConfig(configPath);

    expect(config.servers[0]?.env.API_TOKEN).toBe('test-secret');

    delete process.env.SWITCHBOARD_TEST_TOKEN;
  });

  it('should error on missing environment variable', async () => {
    const configYaml = `
servers:
  - name: files
    command: node
    env:
      API_TOKEN: \${ENV:SWITCHBOARD_MISSING_VAR}
`;

    await fs.writeFile(configPath, configYaml);

    await expect(loadConfig(configPath)).rejects.toThrow(
      'Environment variable SWITCHBOARD_MISSING_VAR not found'
    );
  });

  it('should wrap a missing file in ConfigurationError', async () => {
    await expect(loadConfig(path.join(tempDir, 'absent.yaml'))).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('should reject YAML with duplicate keys', async () => {
    const configYaml = `
servers: []
servers: []
`;

    await fs.writeFile(configPath, configYaml);

    await expect(loadConfig(configPath)).rejects.toThrow(/Failed to load config/);
  });

  it('should reject files over 1MB', async () => {
    await fs.writeFile(configPath, `# ${'x'.repeat(1024 * 1024)}\nservers: []\n`);

    await expect(loadConfig(configPath)).rejects.toThrow('exceeds 1MB size limit');
  });
});

describe('parseConfig', () => {
  it('merges server_groups membership into each definition', () => {
    const config = parseConfig({
      servers: [
        { name: 'files', command: 'node', groups: ['local'] },
        { name: 'db', command: 'node' },
      ],
      server_groups: {
        fs: { servers: ['files', 'db'], description: 'File servers' },
      },
    });

    expect(config.servers.find(server => server.name === 'files')?.groups).toEqual(['fs', 'local']);
    expect(config.servers.find(server => server.name === 'db')?.groups).toEqual(['fs']);
    expect(config.groups).toEqual({
      fs: { servers: ['files', 'db'], description: 'File servers' },
      local: { servers: ['files'] },
    });
  });

  it('keeps only active servers when active_servers is set', () => {
    const config = parseConfig({
      servers: [
        { name: 'files', command: 'node' },
        { name: 'db', command: 'node' },
      ],
      active_servers: ['db'],
    });

    expect(config.servers.map(server => server.name)).toEqual(['db']);
  });

  it('rejects duplicate server names', () => {
    expect(() =>
      parseConfig({
        servers: [
          { name: 'files', command: 'node' },
          { name: 'files', command: 'search-server' },
        ],
      })
    ).toThrow("servers.1.name: duplicate server name 'files'");
  });

  it('rejects groups that reference unknown servers', () => {
    expect(() =>
      parseConfig({
        servers: [{ name: 'files', command: 'node' }],
        server_groups: { local: { servers: ['files', 'ghost'] } },
      })
    ).toThrow("group 'local' references unknown server 'ghost'");
  });

  it('rejects active servers that are not defined', () => {
    expect(() =>
      parseConfig({
        servers: [{ name: 'files', command: 'node' }],
        active_servers: ['ghost'],
      })
    ).toThrow("active server 'ghost' is not defined");
  });

  it('rejects a jitter ratio of 1 or more', () => {
    expect(() =>
      parseConfig({
        servers: [],
        defaults: { reconnect: { jitter_ratio: 1 } },
      })
    ).toThrow(ConfigurationError);
  });
});

describe('parseServerDefinition', () => {
  it('applies defaults', () => {
    expect(parseServerDefinition({ name: 'files', command: 'node' })).toEqual({
      name: 'files',
      command: 'node',
      args: [],
      env: {},
      groups: [],
    });
  });

  it('rejects an empty command', () => {
    expect(() => parseServerDefinition({ name: 'files', command: '   ' })).toThrow(
      'command: command must not be empty'
    );
  });

  it('rejects shell metacharacters in the command', () => {
    expect(() => parseServerDefinition({ name: 'files', command: 'node; rm -rf /' })).toThrow(
      'command contains shell metacharacters'
    );
  });

  it('rejects blocked environment overrides', () => {
    expect(() =>
      parseServerDefinition({ name: 'files', command: 'node', env: { LD_PRELOAD: '/tmp/x.so' } })
    ).toThrow("env.LD_PRELOAD: environment variable 'LD_PRELOAD' may not be overridden");
  });

  it('rejects names with reserved characters', () => {
    expect(() => parseServerDefinition({ name: '*', command: 'node' })).toThrow(ConfigurationError);
  });

  it('rejects server names that shadow object members', () => {
    expect(() => parseServerDefinition({ name: '__proto__', command: 'node' })).toThrow(
      "name: name '__proto__' is reserved"
    );
    expect(() => parseServerDefinition({ name: 'prototype', command: 'node' })).toThrow(ConfigurationError);
  });

  it('rejects reserved group names as ConfigurationError', () => {
    expect(() => parseConfig({ servers: [{ name: 'a', command: 'node', groups: ['__proto__'] }] })).toThrow(
      "servers.0.groups.0: group name '__proto__' is reserved"
    );

    const raw: unknown = JSON.parse(
      '{"servers": [{"name": "a", "command": "node"}], "server_groups": {"__proto__": {"servers": ["a"]}}}'
    );
    expect(() => parseConfig(raw)).toThrow(ConfigurationError);
    expect(() => parseConfig(raw)).toThrow("group name '__proto__' is reserved");
  });

  it('builds groups as own entries', () => {
    const config = parseConfig({
      servers: [{ name: 'a', command: 'node', groups: ['valueOf'] }],
    });

    expect(Object.keys(config.groups)).toEqual(['valueOf']);
    expect(config.groups.valueOf).toEqual({ servers: ['a'] });
  });
});
