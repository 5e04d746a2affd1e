export type HttpTransportKind = 'sse' | 'http';

export type StdioTransportConfig = {
  kind: 'stdio';
  command: string;
  args: string[];
  env: Record<string, string>;
  extraArgs: string[];
};

export type HttpTransportConfig = {
  kind: HttpTransportKind;
  url: string;
  headers: Record<string, string>;
  /** Seconds. */
  timeout: number;
  extraArgs: string[];
};

export type ManagedInstalledTransportConfig = {
  kind: 'managed-installed';
  serverName: string;
  args: string[];
  pythonVersion?: string;
  extraPackages: string[];
  env: Record<string, string>;
  extraArgs: string[];
};

export type ManagedLocalTransportConfig = Omit<ManagedInstalledTransportConfig, 'kind'> & {
  kind: 'managed-local';
  projectPath: string;
};

export type TransportConfig = StdioTransportConfig | HttpTransportConfig | ManagedInstalledTransportConfig | ManagedLocalTransportConfig;

export type TransportKind = TransportConfig['kind'];

export type ProcessDescriptor = {
  kind: 'process';
  transport: 'stdio' | 'managed-installed' | 'managed-local';
  command: string;
  args: string[];
  env: Record<string, string>;
};

export type NetworkDescriptor = {
  kind: 'network';
  transport: HttpTransportKind;
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
};

export type ConnectionDescriptor = ProcessDescriptor | NetworkDescriptor;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type LogSettings = {
  level: LogLevel;
  file?: string;
  logRequests: boolean;
  logResponses: boolean;
};

export type RootDefinition = {
  uri: string;
  name?: string;
};

export type ClientConfig = {
  transport: TransportConfig;
  logging: LogSettings;
  clientName: string;
  clientVersion: string;
  roots: RootDefinition[];
};

export type ServerProfile = TransportConfig & { summary?: string };

export type FileConfig = {
  defaultServer?: string;
  strictEnv?: boolean;
  logging?: Partial<LogSettings>;
  servers: Record<string, ServerProfile>;
};

export type ServerCapabilities = Readonly<{
  tools: boolean;
  resources: boolean;
  prompts: boolean;
  logging: boolean;
  experimental: Readonly<Record<string, unknown>>;
}>;

export type ServerInfo = Readonly<{
  name: string;
  version: string;
  protocolVersion: string;
  instructions?: string;
  capabilities?: ServerCapabilities;
}>;

export type MessageDirection = 'request' | 'response' | 'notification';

export type LogEntry = Readonly<{
  timestamp: Date;
  direction: MessageDirection;
  method: string;
  data: Record<string, unknown>;
  durationMs?: number;
  error?: string;
}>;

export type ExportedLogEntry = {
  timestamp: string;
  direction: MessageDirection;
  method: string;
  data: Record<string, unknown>;
  durationMs: number | null;
  error: string | null;
};

export type ContentItem =
  | { kind: 'text'; type: string; text: string; raw: Record<string, unknown> }
  | { kind: 'opaque'; type: string; raw: unknown };

export type ToolCallResult = Readonly<{
  toolName: string;
  arguments: Record<string, unknown>;
  content: readonly ContentItem[];
  isError: boolean;
  text?: string;
  structuredContent?: Record<string, unknown>;
}>;

export type ResourceContent =
  | { kind: 'text'; uri: string; mimeType?: string; text: string }
  | { kind: 'blob'; uri: string; mimeType?: string; blob: string }
  | { kind: 'opaque'; uri: string; raw: unknown };

export type ResourceReadResult = Readonly<{
  uri: string;
  contents: readonly ResourceContent[];
  text?: string;
}>;

export type PromptMessageView = Readonly<{
  role: string;
  content: ContentItem;
  text?: string;
}>;

export type PromptResult = Readonly<{
  name: string;
  arguments: Record<string, string>;
  description?: string;
  messages: readonly PromptMessageView[];
}>;

export type Row = Record<string, string | number | boolean>;
