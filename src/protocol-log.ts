import type { Logger } from 'pino';
import { redact } from './io.js';
import { silentLogger } from './logging.js';
import type { ExportedLogEntry, LogEntry, MessageDirection, Row } from './types.js';

export type RequestHandle = Readonly<{ entry: LogEntry; startedAt: number }>;

export type EntryFilter = {
  direction?: MessageDirection;
  method?: string;
  limit?: number;
};

export type ProtocolLoggerOptions = {
  logger?: Logger;
  logRequests?: boolean;
  logResponses?: boolean;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function hasToJson(value: unknown): value is { toJSON: () => unknown } {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'toJSON') === 'function';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

// Entries own their data: later changes to the caller's objects must not reach the trace.
function snapshot(data: Record<string, unknown>): Record<string, unknown> {
  let copy: Record<string, unknown>;
  try {
    copy = structuredClone(data);
  } catch {
    const json: unknown = JSON.parse(JSON.stringify(data));
    copy = isPlainObject(json) ? json : {};
  }
  return deepFreeze(copy);
}

export function toLogData(result: unknown): Record<string, unknown> {
  if (hasToJson(result)) {
    const dumped = result.toJSON();
    return isPlainObject(dumped) ? dumped : { result: String(dumped) };
  }
  if (isPlainObject(result)) return result;
  return { result: String(result) };
}

export function toExported(entry: LogEntry): ExportedLogEntry {
  return {
    timestamp: entry.timestamp.toISOString(),
    direction: entry.direction,
    method: entry.method,
    data: entry.data,
    durationMs: entry.durationMs ?? null,
    error: entry.error ?? null
  };
}

/** Append-only, in-memory trace of every request, response and notification a session exchanged. */
export class ProtocolLogger {
  private entries: LogEntry[] = [];
  private readonly logger: Logger;
  private readonly logRequests: boolean;
  private readonly logResponses: boolean;
  droppedTraceLines = 0;

  constructor(options: ProtocolLoggerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.logRequests = options.logRequests ?? true;
    this.logResponses = options.logResponses ?? true;
  }

  get size(): number {
    return this.entries.length;
  }

  private append(entry: LogEntry): LogEntry {
    const frozen = Object.freeze(entry);
    this.entries.push(frozen);
    return frozen;
  }

  // Trace lines are best-effort: a failing sink must not break the operation being traced.
  private trace(write: (logger: Logger) => void): void {
    try {
      write(this.logger);
    } catch {
      this.droppedTraceLines += 1;
    }
  }

  logRequest(method: string, params?: Record<string, unknown>): RequestHandle {
    const startedAt = performance.now();
    const entry = this.append({ timestamp: new Date(), direction: 'request', method, data: snapshot(params ?? {}) });
    if (this.logRequests) this.trace((logger) => logger.debug({ method, params: redact(params ?? {}) }, `REQUEST ${method}`));
    return Object.freeze({ entry, startedAt });
  }

  logResponse(method: string, result: unknown, request?: RequestHandle, error?: string): LogEntry {
    const durationMs = request ? Math.max(0, performance.now() - request.startedAt) : undefined;
    const entry = this.append({
      timestamp: new Date(),
      direction: 'response',
      method,
      data: snapshot(toLogData(result)),
      ...(durationMs !== undefined ? { durationMs } : {}),
      ...(error !== undefined ? { error } : {})
    });
    if (this.logResponses) {
      this.trace((logger) => {
        if (error !== undefined) logger.error({ method, error }, `RESPONSE ERROR ${method}`);
        else logger.debug({ method, durationMs }, `RESPONSE ${method}`);
      });
    }
    return entry;
  }

  logNotification(method: string, params?: Record<string, unknown>): LogEntry {
    const entry = this.append({ timestamp: new Date(), direction: 'notification', method, data: snapshot(params ?? {}) });
    this.trace((logger) => logger.debug({ method }, `NOTIFICATION ${method}`));
    return entry;
  }

  getEntries(filter: EntryFilter = {}): LogEntry[] {
    let result = this.entries.filter(
      (entry) => (filter.direction === undefined || entry.direction === filter.direction) && (filter.method === undefined || entry.method === filter.method)
    );
    if (filter.limit !== undefined) result = filter.limit > 0 ? result.slice(-filter.limit) : [];
    return result;
  }

  exportJson(): string {
    return JSON.stringify(this.entries.map(toExported), null, 2);
  }

  summarize(): Row[] {
    return this.entries.map((entry) => ({
      time: entry.timestamp.toISOString().slice(11, 23),
      direction: entry.direction,
      method: entry.method,
      durationMs: entry.durationMs === undefined ? '-' : entry.durationMs.toFixed(2),
      status: entry.error === undefined ? 'OK' : 'ERROR'
    }));
  }

  clear(): void {
    this.entries = [];
  }
}
