import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { defaultLogSettings } from './logging.js';
import type {
  ClientConfig,
  FileConfig,
  HttpTransportConfig,
  LogSettings,
  ManagedInstalledTransportConfig,
  ManagedLocalTransportConfig,
  RootDefinition,
  StdioTransportConfig,
  TransportConfig
} from './types.js';

export const DEFAULT_TIMEOUT_SECONDS = 30;

const stringList = z.array(z.string()).default([]);
const stringMap = z.record(z.string()).default({});
const nonEmpty = z.string().trim().min(1);

const stdioSchema = z.object({ kind: z.literal('stdio'), command: nonEmpty, args: stringList, env: stringMap, extraArgs: stringList });

const httpSchema = z.object({
  kind: z.enum(['sse', 'http']),
  url: z.string().url(),
  headers: stringMap,
  timeout: z.number().positive().default(DEFAULT_TIMEOUT_SECONDS),
  extraArgs: stringList
});

const managedFields = {
  serverName: nonEmpty,
  args: stringList,
  pythonVersion: z.string().optional(),
  extraPackages: stringList.transform((pkgs) => [...new Set(pkgs)]),
  env: stringMap,
  extraArgs: stringList
};

const managedInstalledSchema = z.object({ kind: z.literal('managed-installed'), ...managedFields });
const managedLocalSchema = z.object({ kind: z.literal('managed-local'), projectPath: nonEmpty, ...managedFields });

export const transportSchema = z.discriminatedUnion('kind', [stdioSchema, httpSchema, managedInstalledSchema, managedLocalSchema]);

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const logSchema = z.object({
  level: logLevelSchema.optional(),
  file: z.string().optional(),
  logRequests: z.boolean().optional(),
  logResponses: z.boolean().optional()
});

// Config files spell the tag `transport`, as the CLI flags do.
const profileSchema = z
  .object({ transport: z.enum(['stdio', 'sse', 'http', 'managed-installed', 'managed-local']), summary: z.string().optional() })
  .passthrough()
  .transform(({ transport, summary, ...rest }, ctx) => {
    const parsed = transportSchema.safeParse({ ...rest, kind: transport });
    if (!parsed.success) {
      for (const issue of parsed.error.issues) ctx.addIssue(issue);
      return z.NEVER;
    }
    return { ...parsed.data, ...(summary !== undefined ? { summary } : {}) };
  });

const fileSchema = z.object({
  defaultServer: z.string().optional(),
  strictEnv: z.boolean().optional(),
  logging: logSchema.optional(),
  servers: z.record(profileSchema).default({})
});

export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/** Validates an untyped transport configuration, e.g. one read from a file or built from flags. */
export function parseTransportConfig(input: unknown): TransportConfig {
  const parsed = transportSchema.safeParse(input);
  if (!parsed.success) throw new ConfigurationError(`Invalid transport configuration: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

export function forStdio(command: string, args: string[] = [], env: Record<string, string> = {}, extraArgs: string[] = []): StdioTransportConfig {
  return { kind: 'stdio', command, args: [...args], env: { ...env }, extraArgs: [...extraArgs] };
}

type HttpOptions = { headers?: Record<string, string>; timeout?: number; extraArgs?: string[] };

function forNetwork(kind: HttpTransportConfig['kind'], url: string, options: HttpOptions): HttpTransportConfig {
  return {
    kind,
    url,
    headers: { ...(options.headers ?? {}) },
    timeout: options.timeout ?? DEFAULT_TIMEOUT_SECONDS,
    extraArgs: [...(options.extraArgs ?? [])]
  };
}

export function forSse(url: string, options: HttpOptions = {}): HttpTransportConfig {
  return forNetwork('sse', url, options);
}

export function forHttp(url: string, options: HttpOptions = {}): HttpTransportConfig {
  return forNetwork('http', url, options);
}

type ManagedOptions = { args?: string[]; pythonVersion?: string; extraPackages?: string[]; env?: Record<string, string>; extraArgs?: string[] };

function managedBase(serverName: string, options: ManagedOptions): Omit<ManagedInstalledTransportConfig, 'kind'> {
  return {
    serverName,
    args: [...(options.args ?? [])],
    ...(options.pythonVersion ? { pythonVersion: options.pythonVersion } : {}),
    extraPackages: [...new Set(options.extraPackages ?? [])],
    env: { ...(options.env ?? {}) },
    extraArgs: [...(options.extraArgs ?? [])]
  };
}

export function forManagedInstalled(serverName: string, options: ManagedOptions = {}): ManagedInstalledTransportConfig {
  return { kind: 'managed-installed', ...managedBase(serverName, options) };
}

export function forManagedLocal(projectPath: string, serverName: string, options: ManagedOptions = {}): ManagedLocalTransportConfig {
  return { kind: 'managed-local', projectPath, ...managedBase(serverName, options) };
}

export function createClientConfig(
  transport: TransportConfig,
  options: { logging?: Partial<LogSettings>; clientName?: string; clientVersion?: string; roots?: RootDefinition[] } = {}
): ClientConfig {
  return {
    transport,
    logging: { ...defaultLogSettings, ...(options.logging ?? {}) },
    clientName: options.clientName ?? 'mcp-diag',
    clientVersion: options.clientVersion ?? '1.0.0',
    roots: [...(options.roots ?? [])]
  };
}

const configNames = ['config.json', 'config.yaml', 'config.yml'];

type RawConfig = { file: string; data: unknown };

function readConfigDir(dir: string): RawConfig | undefined {
  for (const name of configNames) {
    const file = path.join(dir, name);
    if (!fs.existsSync(file)) continue;
    const raw = fs.readFileSync(file, 'utf8');
    try {
      const data: unknown = name.endsWith('.json') ? JSON.parse(raw) : yaml.load(raw);
      return { file, data: data ?? {} };
    } catch (error) {
      throw new ConfigurationError(`Cannot parse ${file}`, { cause: error });
    }
  }
  return undefined;
}

const strictEnvSchema = z.object({ strictEnv: z.boolean().optional() }).passthrough();

function strictEnvOf(raw?: RawConfig): boolean | undefined {
  const parsed = strictEnvSchema.safeParse(raw?.data);
  return parsed.success ? parsed.data.strictEnv : undefined;
}

// Variables are expanded before validation, so `${VAR}` may stand in for a url.
function parseConfig(raw: RawConfig | undefined, strictEnv: boolean): FileConfig {
  if (!raw) return { servers: {} };
  const parsed = fileSchema.safeParse(expandObject(raw.data, strictEnv));
  if (!parsed.success) throw new ConfigurationError(`Invalid config ${raw.file}: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

function expandValue(value: string, strictEnv: boolean): string {
  return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_m, key: string) => {
    const got = process.env[key];
    if (got !== undefined) return got;
    if (strictEnv) throw new ConfigurationError(`Missing environment variable: ${key}`);
    return `\${${key}}`;
  });
}

function expandObject<T>(obj: T, strictEnv: boolean): T;
function expandObject(obj: unknown, strictEnv: boolean): unknown {
  if (typeof obj === 'string') return expandValue(obj, strictEnv);
  if (Array.isArray(obj)) return obj.map((it) => expandObject(it, strictEnv));
  if (obj && typeof obj === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) out[k] = expandObject(v, strictEnv);
    return out;
  }
  return obj;
}

export function resolveConfig(configDir?: string): FileConfig {
  const globalDir = configDir ?? path.join(os.homedir(), '.mcp-diag');
  const localDir = path.join(process.cwd(), '.mcp-diag');
  const globalRaw = readConfigDir(globalDir);
  const localRaw = readConfigDir(localDir);
  const strictEnv = strictEnvOf(localRaw) ?? strictEnvOf(globalRaw) ?? false;
  const global = parseConfig(globalRaw, strictEnv);
  const local = parseConfig(localRaw, strictEnv);

  return {
    defaultServer: local.defaultServer ?? global.defaultServer,
    strictEnv,
    logging: { ...(global.logging ?? {}), ...(local.logging ?? {}) },
    servers: { ...global.servers, ...local.servers }
  };
}

export function selectServerName(config: FileConfig, server?: string): string {
  const selected = server ?? process.env.MCP_DIAG_SERVER ?? config.defaultServer;
  if (!selected) throw new ConfigurationError('No connection method specified. Use a transport flag, --server, or configure defaultServer.');
  if (!config.servers[selected]) throw new ConfigurationError(`Server not found in config: ${selected}`);
  return selected;
}

export type ConnectionOptions = {
  server?: string;
  stdio?: string[];
  sse?: string;
  http?: string;
  uv?: string;
  uvxLocal?: string[];
  python?: string;
  with?: string[];
  envVar?: Record<string, string>;
  header?: Record<string, string>;
  timeout?: number;
  extra?: string[];
};

/**
 * Turns CLI connection flags into a transport configuration. Exactly one transport flag may be given;
 * with none, the named (or default) server profile from the config files is used.
 */
export function transportFromOptions(options: ConnectionOptions, config: FileConfig): TransportConfig {
  const selected = (['stdio', 'sse', 'http', 'uv', 'uvxLocal'] as const).filter((key) => options[key] !== undefined);
  if (selected.length > 1) throw new ConfigurationError(`Use only one transport, got: ${selected.join(', ')}`);
  const extraArgs = options.extra ?? [];
  const env = options.envVar ?? {};
  const managed: ManagedOptions = { pythonVersion: options.python, extraPackages: options.with, env, extraArgs };

  if (options.stdio) {
    const [command, ...args] = options.stdio;
    return parseTransportConfig(forStdio(command ?? '', args, env, extraArgs));
  }
  if (options.sse) return parseTransportConfig(forSse(options.sse, { headers: options.header, timeout: options.timeout, extraArgs }));
  if (options.http) return parseTransportConfig(forHttp(options.http, { headers: options.header, timeout: options.timeout, extraArgs }));
  if (options.uv) return parseTransportConfig(forManagedInstalled(options.uv, managed));
  if (options.uvxLocal) {
    if (options.uvxLocal.length !== 2) throw new ConfigurationError('--uvx-local expects <projectPath> <serverName>');
    const [projectPath, serverName] = options.uvxLocal;
    return parseTransportConfig(forManagedLocal(projectPath ?? '', serverName ?? '', managed));
  }

  const name = selectServerName(config, options.server);
  const { summary: _summary, ...profile } = config.servers[name];
  return parseTransportConfig({ ...profile, extraArgs: [...profile.extraArgs, ...extraArgs] });
}

export function logSettingsFromEnv(base: Partial<LogSettings> = {}): Partial<LogSettings> {
  const level = logLevelSchema.safeParse(process.env.MCP_DIAG_LOG_LEVEL?.toLowerCase());
  return {
    ...base,
    ...(level.success ? { level: level.data } : {}),
    ...(process.env.MCP_DIAG_LOG_FILE ? { file: process.env.MCP_DIAG_LOG_FILE } : {})
  };
}
