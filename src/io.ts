import fs from 'node:fs';
import { ConfigurationError } from './errors.js';

export type ArgsInputOptions = { args?: string; argsFile?: string; argsStdin?: boolean };

export function parseArgsInput(options: ArgsInputOptions): Record<string, unknown> {
  const count = [options.args, options.argsFile, options.argsStdin ? '1' : undefined].filter(Boolean).length;
  if (count > 1) throw new ConfigurationError('Use only one of --args, --args-file, or --args-stdin');
  let raw = '{}';
  if (options.args) raw = options.args;
  else if (options.argsFile) raw = fs.readFileSync(options.argsFile, 'utf8');
  else if (options.argsStdin) raw = fs.readFileSync(0, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError('Invalid JSON input');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) throw new ConfigurationError('Arguments must be a JSON object');
  return { ...parsed };
}

/** Prompt arguments are string-valued on the wire; scalars are coerced, anything else is rejected. */
export function toStringArguments(args: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(args)) {
    if (typeof value === 'string') out[key] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') out[key] = String(value);
    else throw new ConfigurationError(`Prompt argument "${key}" must be a string`);
  }
  return out;
}

export function parsePairs(values: readonly string[], separator: '=' | ':'): Record<string, string> {
  const out: Record<string, string> = {};
  for (const value of values) {
    const idx = value.indexOf(separator);
    if (idx <= 0) throw new ConfigurationError(`Expected NAME${separator}VALUE, got: ${value}`);
    out[value.slice(0, idx).trim()] = value.slice(idx + 1).trim();
  }
  return out;
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      if (/authorization|token|secret|password|api[-_]?key|cookie/i.test(k)) out[k] = '***REDACTED***';
      else out[k] = redact(v);
    }
    return out;
  }
  return value;
}
