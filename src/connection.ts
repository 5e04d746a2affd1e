import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { Transport, TransportSendOptions } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ListRootsRequestSchema,
  type JSONRPCMessage,
  type LoggingLevel,
  type MessageExtraInfo,
  type Prompt,
  type Resource,
  type ResourceTemplate,
  type ServerCapabilities as WireCapabilities,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';
import { UnsupportedCapabilityError, errorMessage } from './errors.js';
import { silentLogger } from './logging.js';
import { createTransport } from './transport.js';
import type { ConnectionDescriptor, RootDefinition } from './types.js';

/** Optional client-side operations a connection may or may not be able to perform. */
export type OptionalCapability = 'roots' | 'sampling';

export type InitializeSnapshot = Readonly<{
  serverInfo: { name: string; version: string };
  protocolVersion: string;
  instructions?: string;
  capabilities?: WireCapabilities;
  raw: Record<string, unknown>;
}>;

export interface ProtocolConnection {
  readonly initializeResult: InitializeSnapshot;
  readonly supports: ReadonlySet<OptionalCapability>;
  listTools(options?: RequestOptions): Promise<Tool[]>;
  listResources(options?: RequestOptions): Promise<Resource[]>;
  listResourceTemplates(options?: RequestOptions): Promise<ResourceTemplate[]>;
  readResource(uri: string, options?: RequestOptions): Promise<Record<string, unknown>>;
  subscribeResource(uri: string, options?: RequestOptions): Promise<void>;
  unsubscribeResource(uri: string, options?: RequestOptions): Promise<void>;
  listPrompts(options?: RequestOptions): Promise<Prompt[]>;
  getPrompt(name: string, args: Record<string, string>, options?: RequestOptions): Promise<Record<string, unknown>>;
  callTool(name: string, args: Record<string, unknown>, options?: RequestOptions): Promise<Record<string, unknown>>;
  ping(options?: RequestOptions): Promise<void>;
  setLoggingLevel(level: LoggingLevel, options?: RequestOptions): Promise<void>;
  listRoots(): Promise<RootDefinition[]>;
  createMessage(params: Record<string, unknown>, options?: RequestOptions): Promise<Record<string, unknown>>;
  close(): Promise<void>;
}

export type ConnectOptions = {
  clientName: string;
  clientVersion: string;
  roots: RootDefinition[];
  requestOptions?: RequestOptions;
  onNotification?: (method: string, params: Record<string, unknown>) => void;
  /** Called when the underlying transport closes, whoever closed it. */
  onClose?: () => void;
  logger?: Logger;
};

export type Connector = (descriptor: ConnectionDescriptor, options: ConnectOptions) => Promise<ProtocolConnection>;

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : undefined;
}

/**
 * Transport wrapper that records the raw initialize result and forwards server notifications.
 * Everything else passes through untouched.
 */
export class HandshakeTap implements Transport {
  private initializeId?: string | number;
  initializeResult?: Record<string, unknown>;

  constructor(
    private readonly inner: Transport,
    private readonly onNotification?: (method: string, params: Record<string, unknown>) => void
  ) {}

  start(): Promise<void> {
    return this.inner.start();
  }

  send(message: JSONRPCMessage, options?: TransportSendOptions): Promise<void> {
    const record: Record<string, unknown> = message;
    if (record.method === 'initialize' && (typeof record.id === 'string' || typeof record.id === 'number')) this.initializeId = record.id;
    return this.inner.send(message, options);
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  get onclose(): Transport['onclose'] {
    return this.inner.onclose;
  }

  set onclose(handler: Transport['onclose']) {
    this.inner.onclose = handler;
  }

  get onerror(): Transport['onerror'] {
    return this.inner.onerror;
  }

  set onerror(handler: Transport['onerror']) {
    this.inner.onerror = handler;
  }

  get onmessage(): Transport['onmessage'] {
    return this.inner.onmessage;
  }

  set onmessage(handler: Transport['onmessage']) {
    if (!handler) {
      this.inner.onmessage = undefined;
      return;
    }
    this.inner.onmessage = (message: JSONRPCMessage, extra?: MessageExtraInfo) => {
      this.observe(message);
      handler(message, extra);
    };
  }

  get sessionId(): string | undefined {
    return this.inner.sessionId;
  }

  get setProtocolVersion(): Transport['setProtocolVersion'] {
    const inner = this.inner;
    return inner.setProtocolVersion ? (version: string) => inner.setProtocolVersion?.(version) : undefined;
  }

  private observe(message: JSONRPCMessage): void {
    const record: Record<string, unknown> = message;
    const hasId = record.id !== undefined && record.id !== null;
    if (hasId && record.id === this.initializeId && 'result' in record) {
      this.initializeResult = asRecord(record.result);
      return;
    }
    if (!hasId && typeof record.method === 'string') this.onNotification?.(record.method, asRecord(record.params) ?? {});
  }
}

async function collectPages<T>(fetchPage: (cursor?: string) => Promise<{ items: T[]; nextCursor?: string }>): Promise<T[]> {
  const items: T[] = [];
  const seen = new Set<string>();
  let cursor: string | undefined;
  do {
    const page = await fetchPage(cursor);
    items.push(...page.items);
    cursor = page.nextCursor;
    if (cursor !== undefined && seen.has(cursor)) break;
    if (cursor !== undefined) seen.add(cursor);
  } while (cursor !== undefined);
  return items;
}

export class SdkConnection implements ProtocolConnection {
  readonly supports: ReadonlySet<OptionalCapability>;

  constructor(
    private readonly client: Client,
    readonly initializeResult: InitializeSnapshot,
    private readonly roots: RootDefinition[]
  ) {
    this.supports = new Set<OptionalCapability>(roots.length > 0 ? ['roots'] : []);
  }

  listTools(options?: RequestOptions): Promise<Tool[]> {
    return collectPages(async (cursor) => {
      const page = await this.client.listTools(cursor ? { cursor } : undefined, options);
      return { items: page.tools, nextCursor: page.nextCursor };
    });
  }

  listResources(options?: RequestOptions): Promise<Resource[]> {
    return collectPages(async (cursor) => {
      const page = await this.client.listResources(cursor ? { cursor } : undefined, options);
      return { items: page.resources, nextCursor: page.nextCursor };
    });
  }

  listResourceTemplates(options?: RequestOptions): Promise<ResourceTemplate[]> {
    return collectPages(async (cursor) => {
      const page = await this.client.listResourceTemplates(cursor ? { cursor } : undefined, options);
      return { items: page.resourceTemplates, nextCursor: page.nextCursor };
    });
  }

  readResource(uri: string, options?: RequestOptions): Promise<Record<string, unknown>> {
    return this.client.readResource({ uri }, options);
  }

  async subscribeResource(uri: string, options?: RequestOptions): Promise<void> {
    await this.client.subscribeResource({ uri }, options);
  }

  async unsubscribeResource(uri: string, options?: RequestOptions): Promise<void> {
    await this.client.unsubscribeResource({ uri }, options);
  }

  listPrompts(options?: RequestOptions): Promise<Prompt[]> {
    return collectPages(async (cursor) => {
      const page = await this.client.listPrompts(cursor ? { cursor } : undefined, options);
      return { items: page.prompts, nextCursor: page.nextCursor };
    });
  }

  getPrompt(name: string, args: Record<string, string>, options?: RequestOptions): Promise<Record<string, unknown>> {
    return this.client.getPrompt({ name, arguments: args }, options);
  }

  callTool(name: string, args: Record<string, unknown>, options?: RequestOptions): Promise<Record<string, unknown>> {
    return this.client.callTool({ name, arguments: args }, undefined, options);
  }

  async ping(options?: RequestOptions): Promise<void> {
    await this.client.ping(options);
  }

  async setLoggingLevel(level: LoggingLevel, options?: RequestOptions): Promise<void> {
    await this.client.setLoggingLevel(level, options);
  }

  async listRoots(): Promise<RootDefinition[]> {
    if (!this.supports.has('roots')) throw new UnsupportedCapabilityError('roots');
    return this.roots.map((root) => ({ ...root }));
  }

  // Sampling requests flow from server to client in MCP; a client connection cannot issue one.
  async createMessage(): Promise<Record<string, unknown>> {
    throw new UnsupportedCapabilityError('sampling');
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

/** Performs the handshake over an already-constructed transport. */
export async function connectTransport(transport: Transport, options: ConnectOptions): Promise<SdkConnection> {
  const roots = options.roots.map((root) => ({ ...root }));
  const client = new Client({ name: options.clientName, version: options.clientVersion }, { capabilities: roots.length > 0 ? { roots: { listChanged: false } } : {} });
  if (roots.length > 0) client.setRequestHandler(ListRootsRequestSchema, async () => ({ roots }));

  const tap = new HandshakeTap(transport, options.onNotification);
  const { onClose } = options;
  if (onClose) {
    const previous = client.onclose;
    client.onclose = () => {
      previous?.();
      onClose();
    };
  }
  try {
    await client.connect(tap, options.requestOptions);
  } catch (error) {
    await transport.close().catch((closeError: unknown) => (options.logger ?? silentLogger).warn({ error: errorMessage(closeError) }, 'transport close failed'));
    throw error;
  }

  const serverVersion = client.getServerVersion();
  const raw = tap.initializeResult ?? {};
  const instructions = client.getInstructions();
  const capabilities = client.getServerCapabilities();
  const snapshot: InitializeSnapshot = {
    serverInfo: { name: serverVersion?.name ?? 'unknown', version: serverVersion?.version ?? 'unknown' },
    protocolVersion: typeof raw.protocolVersion === 'string' ? raw.protocolVersion : 'unknown',
    ...(instructions !== undefined ? { instructions } : {}),
    ...(capabilities !== undefined ? { capabilities } : {}),
    raw
  };
  return new SdkConnection(client, snapshot, roots);
}

export const openConnection: Connector = (descriptor, options) => connectTransport(createTransport(descriptor), options);
