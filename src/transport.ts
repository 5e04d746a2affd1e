import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { ConfigurationError } from './errors.js';
import type { ConnectionDescriptor, ManagedInstalledTransportConfig, ManagedLocalTransportConfig, TransportConfig } from './types.js';

export const INSTALLED_RUNNER = 'uv';
export const LOCAL_RUNNER = 'uvx';

function required(value: string, field: string, kind: string): string {
  if (!value.trim()) throw new ConfigurationError(`${kind} transport requires ${field}`);
  return value;
}

function parseUrl(url: string): URL {
  try {
    return new URL(url);
  } catch (error) {
    throw new ConfigurationError(`Invalid server URL: ${url}`, { cause: error });
  }
}

/**
 * Folds free-form tokens into the query string of `url`. `key=value` tokens are split on the first `=`,
 * bare tokens become `token=true`. Existing parameters are kept.
 */
export function foldQueryParams(url: string, tokens: readonly string[]): string {
  if (tokens.length === 0) return url;
  const parsed = parseUrl(url);
  for (const token of tokens) {
    const eq = token.indexOf('=');
    if (eq === -1) parsed.searchParams.append(token, 'true');
    else parsed.searchParams.append(token.slice(0, eq), token.slice(eq + 1));
  }
  return parsed.toString();
}

function managedArgs(cfg: ManagedInstalledTransportConfig | ManagedLocalTransportConfig): string[] {
  const args: string[] = cfg.kind === 'managed-local' ? ['--from', required(cfg.projectPath, 'projectPath', cfg.kind)] : ['run'];
  if (cfg.pythonVersion) args.push('--python', cfg.pythonVersion);
  for (const pkg of new Set(cfg.extraPackages)) args.push('--with', pkg);
  args.push(required(cfg.serverName, 'serverName', cfg.kind), ...cfg.args, ...cfg.extraArgs);
  return args;
}

export function resolve(config: TransportConfig): ConnectionDescriptor {
  switch (config.kind) {
    case 'stdio':
      return {
        kind: 'process',
        transport: 'stdio',
        command: required(config.command, 'command', 'stdio'),
        args: [...config.args, ...config.extraArgs],
        env: { ...config.env }
      };
    case 'managed-installed':
    case 'managed-local':
      return {
        kind: 'process',
        transport: config.kind,
        command: config.kind === 'managed-local' ? LOCAL_RUNNER : INSTALLED_RUNNER,
        args: managedArgs(config),
        env: { ...config.env }
      };
    case 'sse':
    case 'http': {
      required(config.url, 'url', config.kind);
      if (!Number.isFinite(config.timeout) || config.timeout <= 0) {
        throw new ConfigurationError(`${config.kind} transport timeout must be a positive number of seconds`);
      }
      parseUrl(config.url);
      return {
        kind: 'network',
        transport: config.kind,
        url: foldQueryParams(config.url, config.extraArgs),
        headers: { ...config.headers },
        timeoutMs: config.timeout * 1000
      };
    }
    default: {
      const unknown: { kind?: unknown } = config;
      throw new ConfigurationError(`Unknown transport type: ${String(unknown.kind)}`);
    }
  }
}

function withHeaders(baseFetch: typeof fetch, headers: Record<string, string>): typeof fetch {
  if (Object.keys(headers).length === 0) return baseFetch;
  return (input, init) => {
    const merged = new Headers(init?.headers);
    for (const [name, value] of Object.entries(headers)) merged.set(name, value);
    return baseFetch(input, { ...init, headers: merged });
  };
}

export function createTransport(descriptor: ConnectionDescriptor): Transport {
  if (descriptor.kind === 'process') {
    return new StdioClientTransport({
      command: descriptor.command,
      args: descriptor.args,
      env: { ...getDefaultEnvironment(), ...descriptor.env }
    });
  }

  const url = new URL(descriptor.url);
  const requestInit: RequestInit = { headers: descriptor.headers };
  if (descriptor.transport === 'sse') {
    return new SSEClientTransport(url, { requestInit, eventSourceInit: { fetch: withHeaders(globalThis.fetch, descriptor.headers) } });
  }
  return new StreamableHTTPClientTransport(url, { requestInit });
}
