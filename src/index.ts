#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { z } from 'zod';
import { createClientConfig, describeIssues, logLevelSchema, logSettingsFromEnv, resolveConfig, transportFromOptions } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { parseArgsInput, parsePairs, toStringArguments } from './io.js';
import { closeLogFiles } from './logging.js';
import { describeContent, promptRow, resourceRow, resourceTemplateRow, serverInfoRow, toolCallRow, toolRow } from './normalize.js';
import { formatLogSummary, printResult, printRows } from './output.js';
import { Session } from './session.js';
import type { FileConfig, ResourceContent } from './types.js';

const cliOptionsSchema = z.object({
  env: z.string().optional(),
  configDir: z.string().optional(),
  output: z.enum(['json', 'table']).default('table'),
  pretty: z.boolean().optional(),
  trace: z.boolean().optional(),
  exportLog: z.string().optional(),
  logLevel: logLevelSchema.optional(),
  logFile: z.string().optional(),
  server: z.string().optional(),
  stdio: z.array(z.string()).optional(),
  sse: z.string().optional(),
  http: z.string().optional(),
  uv: z.string().optional(),
  uvxLocal: z.array(z.string()).optional(),
  python: z.string().optional(),
  with: z.array(z.string()).default([]),
  envVar: z.array(z.string()).default([]),
  header: z.array(z.string()).default([]),
  timeout: z.number().positive().optional(),
  extra: z.array(z.string()).default([]),
  args: z.string().optional(),
  argsFile: z.string().optional(),
  argsStdin: z.boolean().optional()
});

type CliOptions = z.infer<typeof cliOptionsSchema>;

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function loadEnvFile(file: string): void {
  const envPath = path.resolve(file);
  if (!fs.existsSync(envPath)) {
    console.error(`Warning: .env file not found at ${envPath}`);
    return;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) throw new ConfigurationError(`Cannot load ${envPath}: ${result.error.message}`, { cause: result.error });
}

function prepare(command: Command): { opts: CliOptions; fileConfig: FileConfig } {
  const parsed = cliOptionsSchema.safeParse(command.optsWithGlobals());
  if (!parsed.success) throw new ConfigurationError(`Invalid options: ${describeIssues(parsed.error)}`);
  const opts = parsed.data;
  if (opts.env) loadEnvFile(opts.env);
  return { opts, fileConfig: resolveConfig(opts.configDir) };
}

async function run(command: Command, body: (session: Session, opts: CliOptions) => Promise<void>): Promise<void> {
  const { opts, fileConfig } = prepare(command);
  const transport = transportFromOptions(
    {
      ...opts,
      envVar: parsePairs(opts.envVar, '='),
      header: parsePairs(opts.header, ':')
    },
    fileConfig
  );
  const logging = logSettingsFromEnv(fileConfig.logging);
  const config = createClientConfig(transport, {
    logging: { ...logging, ...(opts.logLevel ? { level: opts.logLevel } : {}), ...(opts.logFile ? { file: opts.logFile } : {}) }
  });

  const session = new Session(config);
  const controller = new AbortController();
  const onSigint = (): void => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSigint);
  try {
    await session.connect((live) => body(live, opts), { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSigint);
    if (opts.trace) console.error(formatLogSummary(session.logger.summarize()));
    if (opts.exportLog) fs.writeFileSync(opts.exportLog, session.logger.exportJson());
  }
}

function withConnectionOptions(command: Command): Command {
  return command
    .option('--server <name>', 'server profile from the config files')
    .option('--stdio <command...>', 'spawn a server over stdio: command [args...]')
    .option('--sse <url>', 'connect over SSE')
    .option('--http <url>', 'connect over streamable HTTP')
    .option('--uv <serverName>', 'run an installed server with `uv run`')
    .option('--uvx-local <pathAndName...>', 'run a server from a local project with `uvx --from`: projectPath serverName')
    .option('--python <version>', 'Python version for uv and uvx servers')
    .option('--with <package>', 'extra package for uv and uvx servers (repeatable)', collect, [])
    .option('--env-var <KEY=VALUE>', 'environment variable for spawned servers (repeatable)', collect, [])
    .option('--header <Name: value>', 'HTTP header for network transports (repeatable)', collect, [])
    .option('--timeout <seconds>', 'request timeout for network transports', (v) => Number(v))
    .option('-x, --extra <token>', 'extra server argument or query parameter (repeatable)', collect, []);
}

function withArgsOptions(command: Command): Command {
  return command.option('--args <json>').option('--args-file <path>').option('--args-stdin');
}

function describeResourceContent(content: ResourceContent): string {
  if (content.kind === 'text') return content.text;
  if (content.kind === 'blob') return `[blob ${content.mimeType ?? 'application/octet-stream'}, ${content.blob.length} base64 chars]`;
  return JSON.stringify(content.raw);
}

const program = new Command();
program
  .name('mcp-diag')
  .description('Connect to an MCP server, inspect its capabilities and trace the protocol exchange')
  .version('0.1.0')
  .option('--env <file>', 'load environment variables from a .env file')
  .option('--config-dir <path>')
  .option('--output <format>', 'json|table', 'table')
  .option('--pretty')
  .option('--trace', 'print the protocol log summary to stderr')
  .option('--export-log <file>', 'write the protocol log as JSON')
  .option('--log-level <level>')
  .option('--log-file <path>');

withConnectionOptions(program.command('connect').description('connect and show server information')).action(async (_opts, command: Command) => {
  await run(command, async (session, opts) => {
    const info = session.serverInfo;
    if (!info) return;
    if (opts.output === 'json') printResult({ serverInfo: info }, opts);
    else printRows(Object.entries(serverInfoRow(info)).map(([property, value]) => ({ property, value: value === '' ? '-' : value })), ['property', 'value']);
  });
});

withConnectionOptions(program.command('tools').description('list tools')).action(async (_opts, command: Command) => {
  await run(command, async (session, opts) => {
    const tools = await session.listTools();
    if (opts.output === 'json') printResult({ tools }, opts);
    else printRows(tools.map(toolRow), ['name', 'description']);
  });
});

withConnectionOptions(program.command('resources').description('list resources')).action(async (_opts, command: Command) => {
  await run(command, async (session, opts) => {
    const resources = await session.listResources();
    if (opts.output === 'json') printResult({ resources }, opts);
    else printRows(resources.map(resourceRow), ['name', 'uri', 'description']);
  });
});

withConnectionOptions(program.command('templates').description('list resource templates')).action(async (_opts, command: Command) => {
  await run(command, async (session, opts) => {
    const resourceTemplates = await session.listResourceTemplates();
    if (opts.output === 'json') printResult({ resourceTemplates }, opts);
    else printRows(resourceTemplates.map(resourceTemplateRow), ['name', 'uriTemplate', 'description']);
  });
});

withConnectionOptions(program.command('prompts').description('list prompts')).action(async (_opts, command: Command) => {
  await run(command, async (session, opts) => {
    const prompts = await session.listPrompts();
    if (opts.output === 'json') printResult({ prompts }, opts);
    else printRows(prompts.map(promptRow), ['name', 'arguments', 'description']);
  });
});

withConnectionOptions(withArgsOptions(program.command('call <toolName>').description('call a tool'))).action(
  async (toolName: string, _opts, command: Command) => {
    await run(command, async (session, opts) => {
      const result = await session.callTool(toolName, parseArgsInput(opts));
      if (opts.output === 'json') {
        printResult({ ...toolCallRow(result), arguments: result.arguments, content: result.content.map(describeContent), structuredContent: result.structuredContent }, opts);
        return;
      }
      console.log(result.isError ? 'Tool returned error:' : 'Tool result:');
      if (result.text !== undefined) console.log(result.text);
      else result.content.forEach((item) => console.log(describeContent(item)));
    });
  }
);

withConnectionOptions(program.command('read <uri>').description('read a resource')).action(async (uri: string, _opts, command: Command) => {
  await run(command, async (session, opts) => {
    const result = await session.readResource(uri);
    if (opts.output === 'json') printResult(result, opts);
    else result.contents.forEach((content) => console.log(describeResourceContent(content)));
  });
});

withConnectionOptions(withArgsOptions(program.command('prompt <promptName>').description('get a prompt'))).action(
  async (promptName: string, _opts, command: Command) => {
    await run(command, async (session, opts) => {
      const result = await session.getPrompt(promptName, toStringArguments(parseArgsInput(opts)));
      if (opts.output === 'json') {
        printResult(result, opts);
        return;
      }
      for (const message of result.messages) console.log(`${message.role}:\n${message.text ?? describeContent(message.content)}\n`);
    });
  }
);

withConnectionOptions(program.command('ping').description('check that the server answers')).action(async (_opts, command: Command) => {
  await run(command, async (session, opts) => {
    const ok = await session.ping();
    if (!ok) process.exitCode = 1;
    printResult(opts.output === 'json' ? { ok } : ok ? 'ok' : 'failed', opts);
  });
});

program
  .command('servers')
  .description('list server profiles from the config files')
  .action(async (_opts, command: Command) => {
    const { opts, fileConfig } = prepare(command);
    const servers = Object.entries(fileConfig.servers).map(([name, server]) => ({ name, transport: server.kind, summary: server.summary ?? '' }));
    if (opts.output === 'json') printResult({ servers }, opts);
    else printRows(servers, ['name', 'transport', 'summary']);
  });

program
  .parseAsync()
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    if (process.exitCode === undefined || process.exitCode === 0) process.exitCode = error instanceof ConfigurationError ? 2 : 1;
  })
  .finally(closeLogFiles);
