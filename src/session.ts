import type { RequestOptions } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type { LoggingLevel, Prompt, Resource, ResourceTemplate, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';
import { openConnection, type Connector, type OptionalCapability, type ProtocolConnection } from './connection.js';
import { McpDiagError, NotConnectedError, SessionBusyError, TransportFailure, UnsupportedCapabilityError, errorMessage, toOperationError } from './errors.js';
import { createLogger } from './logging.js';
import { normalizePromptResult, normalizeResourceContents, normalizeToolResult, parseServerInfo } from './normalize.js';
import { ProtocolLogger } from './protocol-log.js';
import { resolve } from './transport.js';
import type {
  ClientConfig,
  ConnectionDescriptor,
  LogEntry,
  PromptResult,
  ResourceReadResult,
  RootDefinition,
  ServerCapabilities,
  ServerInfo,
  ToolCallResult
} from './types.js';

export type SessionState = 'disconnected' | 'connecting' | 'connected';

export type SessionOptions = {
  logger?: ProtocolLogger;
  diagnostics?: Logger;
  connector?: Connector;
};

export type ConnectScopeOptions = {
  signal?: AbortSignal;
};

type Live = { connection: ProtocolConnection; info: ServerInfo; requestOptions: RequestOptions };

/**
 * One connection to one MCP server. `connect()` owns the connection for the duration of a callback and
 * releases it on every exit path; capability operations are only valid inside that callback.
 */
export class Session {
  readonly logger: ProtocolLogger;
  private readonly diagnostics: Logger;
  private readonly connector: Connector;
  private currentState: SessionState = 'disconnected';
  private live?: Live;
  private lost = false;

  constructor(
    readonly config: ClientConfig,
    options: SessionOptions = {}
  ) {
    this.diagnostics = options.diagnostics ?? createLogger(config.logging);
    this.logger =
      options.logger ??
      new ProtocolLogger({ logger: this.diagnostics, logRequests: config.logging.logRequests, logResponses: config.logging.logResponses });
    this.connector = options.connector ?? openConnection;
  }

  get state(): SessionState {
    return this.currentState;
  }

  get connected(): boolean {
    return this.currentState === 'connected';
  }

  get serverInfo(): ServerInfo | undefined {
    return this.live?.info;
  }

  get capabilities(): ServerCapabilities | undefined {
    return this.live?.info.capabilities;
  }

  get instructions(): string | undefined {
    return this.live?.info.instructions;
  }

  get entries(): LogEntry[] {
    return this.logger.getEntries();
  }

  async connect<T>(body: (session: Session) => Promise<T>, options: ConnectScopeOptions = {}): Promise<T> {
    if (this.currentState !== 'disconnected') throw new SessionBusyError();
    const descriptor = resolve(this.config.transport);
    const { signal } = options;
    if (signal?.aborted) throw new TransportFailure('Connection aborted before it started', { cause: signal.reason });

    this.currentState = 'connecting';
    const requestOptions = this.requestOptionsFor(descriptor, signal);
    let onClose = (): void => undefined;
    let connection: ProtocolConnection;
    try {
      connection = await this.connector(descriptor, {
        clientName: this.config.clientName,
        clientVersion: this.config.clientVersion,
        roots: this.config.roots,
        requestOptions,
        onNotification: (method, params) => {
          if (this.currentState === 'connected') this.logger.logNotification(method, params);
        },
        onClose: () => onClose(),
        logger: this.diagnostics
      });
    } catch (error) {
      this.currentState = 'disconnected';
      throw new TransportFailure(`Failed to connect via ${descriptor.transport}: ${errorMessage(error)}`, { cause: error });
    }

    const info = parseServerInfo(connection.initializeResult);
    this.live = { connection, info, requestOptions };
    this.currentState = 'connected';
    this.logger.logResponse('initialize', connection.initializeResult.raw);
    this.diagnostics.info({ server: info.name, version: info.version, protocolVersion: info.protocolVersion }, 'connected');

    // Closing the connection fires onClose again, so the release is claimed before it starts.
    let releasing = false;
    let released: Promise<void> = Promise.resolve();
    const releaseOnce = (reason: string): Promise<void> => {
      if (!releasing) {
        releasing = true;
        released = this.release(connection, reason);
      }
      return released;
    };
    const releaseInBackground = (reason: string): void => {
      releaseOnce(reason).catch((error: unknown) => this.diagnostics.warn({ error: errorMessage(error), reason }, 'teardown failed'));
    };
    onClose = () => {
      if (this.live?.connection !== connection) return;
      this.lost = true;
      this.diagnostics.warn({ server: info.name }, 'connection lost');
      releaseInBackground('transport closed');
    };
    const onAbort = (): void => releaseInBackground('aborted');
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      return await body(this);
    } finally {
      signal?.removeEventListener('abort', onAbort);
      await releaseOnce('closed');
      this.lost = false;
    }
  }

  private requestOptionsFor(descriptor: ConnectionDescriptor, signal?: AbortSignal): RequestOptions {
    return {
      ...(descriptor.kind === 'network' ? { timeout: descriptor.timeoutMs } : {}),
      ...(signal ? { signal } : {})
    };
  }

  private async release(connection: ProtocolConnection, reason: string): Promise<void> {
    if (this.live?.connection === connection) {
      this.live = undefined;
      this.currentState = 'disconnected';
    }
    try {
      await connection.close();
      this.diagnostics.debug({ reason }, 'connection released');
    } catch (error) {
      this.diagnostics.warn({ error: errorMessage(error), reason }, 'connection close failed');
    }
  }

  private requireLive(operation: string): Live {
    if (this.lost) throw new TransportFailure(`Cannot ${operation}: connection to the server was lost`);
    if (this.currentState !== 'connected' || !this.live) throw new NotConnectedError(operation);
    return this.live;
  }

  // Logs the request, dispatches, logs the outcome; failures are logged and then re-raised as typed errors.
  private async instrument<T>(
    method: string,
    params: Record<string, unknown> | undefined,
    call: (connection: ProtocolConnection, options: RequestOptions) => Promise<T>,
    payload: (result: T) => unknown
  ): Promise<T> {
    const { connection, requestOptions } = this.requireLive(method);
    const request = this.logger.logRequest(method, params);
    try {
      const result = await call(connection, requestOptions);
      this.logger.logResponse(method, payload(result), request);
      return result;
    } catch (error) {
      const failure = this.failureOf(error, method, requestOptions);
      this.logger.logResponse(method, {}, request, failure.message);
      throw failure;
    }
  }

  private failureOf(error: unknown, method: string, requestOptions: RequestOptions): McpDiagError {
    if (requestOptions.signal?.aborted) return new TransportFailure(`${method} cancelled: ${errorMessage(error)}`, { cause: error });
    return toOperationError(error, method);
  }

  listTools(): Promise<Tool[]> {
    return this.instrument('tools/list', undefined, (c, o) => c.listTools(o), (tools) => ({ tools }));
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
    const raw = await this.instrument('tools/call', { name, arguments: args }, (c, o) => c.callTool(name, args, o), (result) => result);
    return normalizeToolResult(name, args, raw);
  }

  listResources(): Promise<Resource[]> {
    return this.instrument('resources/list', undefined, (c, o) => c.listResources(o), (resources) => ({ resources }));
  }

  listResourceTemplates(): Promise<ResourceTemplate[]> {
    return this.instrument('resources/templates/list', undefined, (c, o) => c.listResourceTemplates(o), (resourceTemplates) => ({ resourceTemplates }));
  }

  async readResource(uri: string): Promise<ResourceReadResult> {
    const raw = await this.instrument('resources/read', { uri }, (c, o) => c.readResource(uri, o), (result) => result);
    return normalizeResourceContents(uri, raw);
  }

  async subscribeResource(uri: string): Promise<void> {
    await this.instrument('resources/subscribe', { uri }, (c, o) => c.subscribeResource(uri, o), () => ({ subscribed: true }));
  }

  async unsubscribeResource(uri: string): Promise<void> {
    await this.instrument('resources/unsubscribe', { uri }, (c, o) => c.unsubscribeResource(uri, o), () => ({ unsubscribed: true }));
  }

  listPrompts(): Promise<Prompt[]> {
    return this.instrument('prompts/list', undefined, (c, o) => c.listPrompts(o), (prompts) => ({ prompts }));
  }

  async getPrompt(name: string, args: Record<string, string> = {}): Promise<PromptResult> {
    const raw = await this.instrument('prompts/get', { name, arguments: args }, (c, o) => c.getPrompt(name, args, o), (result) => result);
    return normalizePromptResult(name, args, raw);
  }

  async setLoggingLevel(level: LoggingLevel): Promise<void> {
    await this.instrument('logging/setLevel', { level }, (c, o) => c.setLoggingLevel(level, o), () => ({ level }));
  }

  /** Liveness check: a failed ping is logged and reported as `false`, never raised. */
  async ping(): Promise<boolean> {
    if (this.lost) {
      this.logger.logResponse('ping', { success: false }, this.logger.logRequest('ping'), 'connection to the server was lost');
      return false;
    }
    const { connection, requestOptions } = this.requireLive('ping');
    const request = this.logger.logRequest('ping');
    try {
      await connection.ping(requestOptions);
      this.logger.logResponse('ping', { success: true }, request);
      return true;
    } catch (error) {
      this.logger.logResponse('ping', { success: false }, request, this.failureOf(error, 'ping', requestOptions).message);
      return false;
    }
  }

  private unsupported(method: string, capability: OptionalCapability, connection: ProtocolConnection): boolean {
    if (connection.supports.has(capability)) return false;
    const request = this.logger.logRequest(method);
    this.logger.logResponse(method, {}, request, `${capability} not supported`);
    return true;
  }

  /** Roots are optional: without support the miss is logged and an empty list returned. */
  async listRoots(): Promise<RootDefinition[]> {
    const { connection } = this.requireLive('roots/list');
    if (this.unsupported('roots/list', 'roots', connection)) return [];
    return this.instrument('roots/list', undefined, (c) => c.listRoots(), (roots) => ({ roots }));
  }

  async createMessage(params: Record<string, unknown>): Promise<Record<string, unknown>> {
    const { connection } = this.requireLive('sampling/createMessage');
    if (this.unsupported('sampling/createMessage', 'sampling', connection)) throw new UnsupportedCapabilityError('sampling');
    return this.instrument('sampling/createMessage', params, (c, o) => c.createMessage(params, o), (result) => result);
  }
}

export async function withConnection<T>(
  config: ClientConfig,
  body: (session: Session) => Promise<T>,
  options: SessionOptions & ConnectScopeOptions = {}
): Promise<T> {
  const { signal, ...sessionOptions } = options;
  return new Session(config, sessionOptions).connect(body, { signal });
}
