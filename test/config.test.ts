import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import {
  createClientConfig,
  forHttp,
  forManagedLocal,
  forSse,
  forStdio,
  logSettingsFromEnv,
  parseTransportConfig,
  resolveConfig,
  selectServerName,
  transportFromOptions
} from '../src/config.js';
import { ConfigurationError } from '../src/errors.js';
import type { FileConfig } from '../src/types.js';

function withCwd<T>(dir: string, fn: () => T): T {
  const old = process.cwd();
  process.chdir(dir);
  try {
    return fn();
  } finally {
    process.chdir(old);
  }
}

describe('resolveConfig', () => {
  afterEach(() => {
    delete process.env.MCP_DIAG_TEST_TOKEN;
    delete process.env.MCP_DIAG_TEST_URL;
  });

  it('merges global and local with local override', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-diag-test-'));
    const globalDir = path.join(base, 'global');
    const localDir = path.join(base, 'project', '.mcp-diag');
    fs.mkdirSync(globalDir, { recursive: true });
    fs.mkdirSync(localDir, { recursive: true });
    fs.writeFileSync(path.join(globalDir, 'config.json'), JSON.stringify({ defaultServer: 'a', servers: { a: { transport: 'http', url: 'http://a' } } }));
    fs.writeFileSync(
      path.join(localDir, 'config.json'),
      JSON.stringify({ servers: { a: { transport: 'stdio', command: 'node' }, b: { transport: 'sse', url: 'http://b', summary: 'remote' } } })
    );

    const cfg = withCwd(path.join(base, 'project'), () => resolveConfig(globalDir));
    expect(cfg.defaultServer).toBe('a');
    expect(cfg.servers.a).toEqual({ kind: 'stdio', command: 'node', args: [], env: {}, extraArgs: [] });
    expect(cfg.servers.b).toEqual({ kind: 'sse', url: 'http://b', headers: {}, timeout: 30, extraArgs: [], summary: 'remote' });
  });

  it('reads yaml and expands environment variables', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-diag-test-'));
    fs.writeFileSync(
      path.join(base, 'config.yaml'),
      ['servers:', '  api:', '    transport: http', '    url: http://localhost:3000/mcp', '    headers:', '      Authorization: Bearer ${MCP_DIAG_TEST_TOKEN}'].join('\n')
    );
    process.env.MCP_DIAG_TEST_TOKEN = 'test-secret';
    const cfg = withCwd(base, () => resolveConfig(base));
    expect(cfg.servers.api).toMatchObject({ kind: 'http', headers: { Authorization: 'Bearer test-secret' } });
  });

  it('expands a variable standing in for the url before validating it', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-diag-test-'));
    fs.writeFileSync(path.join(base, 'config.json'), JSON.stringify({ servers: { api: { transport: 'http', url: '${MCP_DIAG_TEST_URL}' } } }));
    process.env.MCP_DIAG_TEST_URL = 'http://localhost:9000/mcp';
    const cfg = withCwd(base, () => resolveConfig(base));
    expect(cfg.servers.api).toEqual({ kind: 'http', url: 'http://localhost:9000/mcp', headers: {}, timeout: 30, extraArgs: [] });
  });

  it('fails on missing variables under strictEnv', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-diag-test-'));
    fs.writeFileSync(
      path.join(base, 'config.json'),
      JSON.stringify({ strictEnv: true, servers: { api: { transport: 'stdio', command: 'node', env: { TOKEN: '${MCP_DIAG_TEST_TOKEN}' } } } })
    );
    expect(() => withCwd(base, () => resolveConfig(base))).toThrow('Missing environment variable: MCP_DIAG_TEST_TOKEN');
  });

  it('rejects invalid server profiles', () => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'mcp-diag-test-'));
    fs.writeFileSync(path.join(base, 'config.json'), JSON.stringify({ servers: { bad: { transport: 'stdio' } } }));
    expect(() => withCwd(base, () => resolveConfig(base))).toThrow(ConfigurationError);
  });
});

describe('transport constructors', () => {
  it('default optional fields', () => {
    expect(forStdio('python')).toEqual({ kind: 'stdio', command: 'python', args: [], env: {}, extraArgs: [] });
    expect(forSse('http://localhost:8000/sse')).toEqual({ kind: 'sse', url: 'http://localhost:8000/sse', headers: {}, timeout: 30, extraArgs: [] });
    expect(forManagedLocal('./srv', 'srv')).toEqual({
      kind: 'managed-local',
      projectPath: './srv',
      serverName: 'srv',
      args: [],
      extraPackages: [],
      env: {},
      extraArgs: []
    });
  });

  it('copy their inputs', () => {
    const args = ['server.py'];
    const config = forStdio('python', args);
    args.push('--late');
    expect(config.args).toEqual(['server.py']);
  });

  it('builds a client config with defaults', () => {
    expect(createClientConfig(forHttp('http://h'))).toEqual({
      transport: forHttp('http://h'),
      logging: { level: 'info', logRequests: true, logResponses: true },
      clientName: 'mcp-diag',
      clientVersion: '1.0.0',
      roots: []
    });
  });
});

describe('parseTransportConfig', () => {
  it('fills defaults and deduplicates packages', () => {
    expect(parseTransportConfig({ kind: 'managed-installed', serverName: 'srv', extraPackages: ['a', 'b', 'a'] })).toEqual({
      kind: 'managed-installed',
      serverName: 'srv',
      args: [],
      extraPackages: ['a', 'b'],
      env: {},
      extraArgs: []
    });
  });

  it('rejects unknown transports', () => {
    expect(() => parseTransportConfig({ kind: 'carrier-pigeon' })).toThrow(ConfigurationError);
  });
});

describe('transportFromOptions', () => {
  const fileConfig: FileConfig = {
    defaultServer: 'local',
    servers: { local: { ...forStdio('node', ['server.js'], {}, ['--base']), summary: 'local server' } }
  };

  it('builds a stdio transport from flags', () => {
    expect(transportFromOptions({ stdio: ['python', 'server.py'], envVar: { DEBUG: '1' }, extra: ['-v'] }, fileConfig)).toEqual(
      forStdio('python', ['server.py'], { DEBUG: '1' }, ['-v'])
    );
  });

  it('builds a local managed transport', () => {
    expect(transportFromOptions({ uvxLocal: ['./srv', 'srv'], python: '3.11', with: ['httpx'] }, fileConfig)).toMatchObject({
      kind: 'managed-local',
      projectPath: './srv',
      serverName: 'srv',
      pythonVersion: '3.11',
      extraPackages: ['httpx']
    });
  });

  it('rejects more than one transport', () => {
    expect(() => transportFromOptions({ sse: 'http://a', http: 'http://b' }, fileConfig)).toThrow('Use only one transport, got: sse, http');
  });

  it('rejects --uvx-local without both values', () => {
    expect(() => transportFromOptions({ uvxLocal: ['./srv'] }, fileConfig)).toThrow('--uvx-local expects <projectPath> <serverName>');
  });

  it('falls back to the default server profile and appends extra args', () => {
    expect(transportFromOptions({ extra: ['-v'] }, fileConfig)).toEqual(forStdio('node', ['server.js'], {}, ['--base', '-v']));
  });

  it('fails without any way to connect', () => {
    expect(() => selectServerName({ servers: {} })).toThrow(ConfigurationError);
    expect(() => selectServerName(fileConfig, 'missing')).toThrow('Server not found in config: missing');
  });
});

describe('logSettingsFromEnv', () => {
  afterEach(() => {
    delete process.env.MCP_DIAG_LOG_LEVEL;
    delete process.env.MCP_DIAG_LOG_FILE;
  });

  it('overrides the level and file from the environment', () => {
    process.env.MCP_DIAG_LOG_LEVEL = 'DEBUG';
    process.env.MCP_DIAG_LOG_FILE = '/tmp/mcp-diag.log';
    expect(logSettingsFromEnv({ level: 'warn', logRequests: false })).toEqual({ level: 'debug', file: '/tmp/mcp-diag.log', logRequests: false });
  });

  it('ignores unknown levels', () => {
    process.env.MCP_DIAG_LOG_LEVEL = 'loud';
    expect(logSettingsFromEnv({ level: 'warn' })).toEqual({ level: 'warn' });
  });
});
