import type { Prompt, Resource, ResourceTemplate, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { InitializeSnapshot } from './connection.js';
import type { ContentItem, PromptResult, ResourceContent, ResourceReadResult, Row, ServerCapabilities, ServerInfo, ToolCallResult } from './types.js';

// Wire shapes are read loosely: servers and protocol revisions disagree on field names and optionality.
const contentListShape = z.array(z.unknown());

const resourceContentShape = z.object({ uri: z.string().default(''), mimeType: z.string().optional(), text: z.string().optional(), blob: z.string().optional() }).passthrough();

const resourceResultShape = z.object({ contents: z.array(z.unknown()).default([]) }).passthrough();

const promptResultShape = z
  .object({
    description: z.string().optional(),
    messages: z.array(z.object({ role: z.string().default('unknown'), content: z.unknown() }).passthrough()).default([])
  })
  .passthrough();

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : undefined;
}

export function normalizeContentItem(item: unknown): ContentItem {
  const record = asRecord(item);
  const declared = record?.type;
  const type = typeof declared === 'string' ? declared : 'unknown';
  if (record && typeof record.text === 'string') return { kind: 'text', type, text: record.text, raw: record };
  return { kind: 'opaque', type, raw: item };
}

function firstText(items: readonly ContentItem[]): string | undefined {
  for (const item of items) if (item.kind === 'text') return item.text;
  return undefined;
}

/**
 * `isError` and `is_error` are the same flag; a result carrying neither is not an error.
 * Each field is read on its own, so one malformed field leaves the others intact.
 */
export function normalizeToolResult(toolName: string, args: Record<string, unknown>, raw: unknown): ToolCallResult {
  const wire = asRecord(raw) ?? {};
  const items = contentListShape.safeParse(wire.content);
  const content = (items.success ? items.data : []).map(normalizeContentItem);
  const text = firstText(content);
  const structuredContent = asRecord(wire.structuredContent);
  return Object.freeze({
    toolName,
    arguments: { ...args },
    content: Object.freeze(content),
    isError: wire.isError === true || wire.is_error === true,
    ...(text !== undefined ? { text } : {}),
    ...(structuredContent ? { structuredContent } : {})
  });
}

function normalizeResourceContent(block: unknown, fallbackUri: string): ResourceContent {
  const parsed = resourceContentShape.safeParse(block);
  if (!parsed.success) return { kind: 'opaque', uri: fallbackUri, raw: block };
  const { uri, mimeType, text, blob } = parsed.data;
  const base = { uri: uri || fallbackUri, ...(mimeType ? { mimeType } : {}) };
  if (text !== undefined) return { kind: 'text', ...base, text };
  if (blob !== undefined) return { kind: 'blob', ...base, blob };
  return { kind: 'opaque', uri: base.uri, raw: block };
}

export function normalizeResourceContents(uri: string, raw: unknown): ResourceReadResult {
  const parsed = resourceResultShape.safeParse(raw ?? {});
  const contents = parsed.success ? parsed.data.contents.map((block) => normalizeResourceContent(block, uri)) : [];
  const first = contents.find((block) => block.kind === 'text');
  return Object.freeze({
    uri,
    contents: Object.freeze(contents),
    ...(first?.kind === 'text' ? { text: first.text } : {})
  });
}

export function normalizePromptResult(name: string, args: Record<string, string>, raw: unknown): PromptResult {
  const parsed = promptResultShape.safeParse(raw ?? {});
  const wire: z.infer<typeof promptResultShape> = parsed.success ? parsed.data : { messages: [] };
  const messages = wire.messages.map((message) => {
    const content = normalizeContentItem(message.content);
    return Object.freeze({ role: message.role, content, ...(content.kind === 'text' ? { text: content.text } : {}) });
  });
  return Object.freeze({
    name,
    arguments: { ...args },
    ...(wire.description ? { description: wire.description } : {}),
    messages: Object.freeze(messages)
  });
}

export function parseServerInfo(init: InitializeSnapshot): ServerInfo {
  const caps = init.capabilities;
  const capabilities: ServerCapabilities | undefined = caps
    ? Object.freeze({
        tools: caps.tools !== undefined,
        resources: caps.resources !== undefined,
        prompts: caps.prompts !== undefined,
        logging: caps.logging !== undefined,
        experimental: Object.freeze({ ...(caps.experimental ?? {}) })
      })
    : undefined;
  return Object.freeze({
    name: init.serverInfo.name,
    version: init.serverInfo.version,
    protocolVersion: init.protocolVersion,
    ...(init.instructions !== undefined ? { instructions: init.instructions } : {}),
    ...(capabilities ? { capabilities } : {})
  });
}

/** Display form of a content item. Never use the result for logic. */
export function describeContent(item: ContentItem): string {
  if (item.kind === 'text') return item.text;
  const record = asRecord(item.raw) ?? {};
  const mimeType = typeof record.mimeType === 'string' ? ` ${record.mimeType}` : '';
  const data = typeof record.data === 'string' ? `, ${record.data.length} base64 chars` : '';
  if (mimeType || data) return `[${item.type}${mimeType}${data}]`;
  return `[${item.type}] ${JSON.stringify(item.raw)}`;
}

export function enabledCapabilities(capabilities?: ServerCapabilities): string[] {
  if (!capabilities) return [];
  return (['tools', 'resources', 'prompts', 'logging'] as const).filter((key) => capabilities[key]);
}

export function serverInfoRow(info: ServerInfo): Row {
  return {
    name: info.name,
    version: info.version,
    protocolVersion: info.protocolVersion,
    instructions: info.instructions ?? '',
    capabilities: enabledCapabilities(info.capabilities).join(', ')
  };
}

export function toolRow(tool: Tool): Row {
  return { name: tool.name, description: tool.description ?? '' };
}

export function resourceRow(resource: Resource): Row {
  return { name: resource.name, uri: resource.uri, mimeType: resource.mimeType ?? '', description: resource.description ?? '' };
}

export function resourceTemplateRow(template: ResourceTemplate): Row {
  return { name: template.name, uriTemplate: template.uriTemplate, mimeType: template.mimeType ?? '', description: template.description ?? '' };
}

export function promptRow(prompt: Prompt): Row {
  const args = (prompt.arguments ?? []).map((arg) => (arg.required ? arg.name : `${arg.name}?`));
  return { name: prompt.name, description: prompt.description ?? '', arguments: args.join(', ') };
}

export function toolCallRow(result: ToolCallResult): Row {
  return { tool: result.toolName, isError: result.isError, text: result.text ?? result.content.map(describeContent).join('\n') };
}
