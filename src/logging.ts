import path from 'node:path';
import pino, { type Logger } from 'pino';
import type { LogSettings } from './types.js';

export const defaultLogSettings: LogSettings = { level: 'info', logRequests: true, logResponses: true };

export const silentLogger: Logger = pino({ level: 'silent' });

type FileDestination = ReturnType<typeof pino.destination>;

const fileDestinations = new Map<string, FileDestination>();

/** One open destination per log file, shared by every logger that writes there. */
export function fileDestination(file: string): FileDestination {
  const key = path.resolve(file);
  let destination = fileDestinations.get(key);
  if (!destination) {
    destination = pino.destination({ dest: key, append: true, mkdir: true });
    fileDestinations.set(key, destination);
  }
  return destination;
}

/** Flushes and closes every log file opened by `createLogger`. */
export function closeLogFiles(): void {
  for (const destination of fileDestinations.values()) destination.end();
  fileDestinations.clear();
}

/**
 * Diagnostic logger for the CLI and the protocol trace. Writes to stderr so command output on stdout
 * stays parseable, or appends to `settings.file` when one is configured.
 */
export function createLogger(settings: Pick<LogSettings, 'level' | 'file'>, name = 'mcp-diag'): Logger {
  if (settings.level === 'silent') return silentLogger;
  const destination = settings.file ? fileDestination(settings.file) : pino.destination(2);
  return pino({ name, level: settings.level }, destination);
}
