import type { Row } from './types.js';

export type OutputOptions = { output?: string; pretty?: boolean };

export function printResult(value: unknown, opts: OutputOptions): void {
  const asJson = opts.output === 'json' || typeof value === 'object';
  if (asJson) console.log(JSON.stringify(value, null, opts.pretty ? 2 : 0));
  else console.log(String(value));
}

function cell(value: Row[string] | undefined): string {
  return String(value ?? '').replace(/[\t\r\n]+/g, ' ');
}

export function formatRows(rows: readonly Row[], columns: readonly string[]): string[] {
  return rows.map((row) => columns.map((column) => cell(row[column])).join('\t'));
}

export function printRows(rows: readonly Row[], columns: readonly string[]): void {
  formatRows(rows, columns).forEach((line) => console.log(line));
}

export function formatLogSummary(rows: readonly Row[]): string {
  const columns = ['time', 'direction', 'method', 'durationMs', 'status'];
  return [columns.join('\t'), ...formatRows(rows, columns)].join('\n');
}
